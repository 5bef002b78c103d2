import React from 'react';
import { Box, Text, useInput } from 'ink';
import type { DebugInfo } from '@stepwise/shared';
import { THEME } from '../theme.js';

interface BreakpointNoticeProps {
  info: DebugInfo;
  onContinue: () => void;
}

function pausedAt(info: DebugInfo): string {
  const toolName = info.details['toolName'];
  switch (info.action) {
    case 'llm':
      return 'before the next model call';
    case 'tool':
      return `before tool ${String(toolName)} ${JSON.stringify(info.details['args'] ?? {})}`;
    case 'state':
      return `after tool ${String(toolName)}`;
    case 'error':
      return 'on error';
  }
}

export const BreakpointNotice: React.FC<BreakpointNoticeProps> = ({ info, onContinue }) => {
  useInput(() => {
    onContinue();
  });

  return (
    <Box borderStyle="single" borderColor={THEME.warning} paddingX={1}>
      <Text bold color={THEME.warning}>
        ⏸ Paused {pausedAt(info)}
      </Text>
      <Text color={THEME.textDim}> · press any key to continue</Text>
    </Box>
  );
};
