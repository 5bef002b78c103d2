import React from 'react';
import { Box, Text } from 'ink';
import type { EngineState, TaskMessage, ToolExecutionRecord } from '@stepwise/shared';
import { THEME } from '../theme.js';

interface EnginePanelProps {
  engine: EngineState | null;
  messages: TaskMessage[];
  tools: ToolExecutionRecord[];
}

function oneLine(text: string, max: number): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  return clean.length > max ? clean.slice(0, max - 1) + '…' : clean;
}

/** Live view of the running task: recent thoughts and tool calls. */
export const EnginePanel: React.FC<EnginePanelProps> = ({ engine, messages, tools }) => {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={THEME.dimBorder} paddingX={1}>
      {engine?.currentAction && (
        <Text color={THEME.primary}>
          {engine.status === 'acting' ? 'running' : 'next'}: {engine.currentAction}
        </Text>
      )}

      {messages.map((m, i) => (
        <Text key={`m${i}`} color={m.role === 'assistant' ? THEME.text : THEME.textDim}>
          {m.role === 'assistant' ? '· ' : '  '}
          {oneLine(m.content, 100)}
        </Text>
      ))}

      {tools.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          {tools.map((t, i) => (
            <Text key={`t${i}`} color={t.result.success ? THEME.success : THEME.error}>
              {t.result.success ? '✓' : '✗'} {t.toolName}{' '}
              <Text color={THEME.textDim}>{oneLine(t.result.message, 80)}</Text>
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
};
