import React from 'react';
import { Box, Text } from 'ink';
import type { EngineState, EngineStatus } from '@stepwise/shared';
import { THEME } from '../theme.js';

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

interface HeaderProps {
  model: string;
  engine: EngineState | null;
  spinnerFrame: number;
}

export const Header: React.FC<HeaderProps> = ({ model, engine, spinnerFrame }) => {
  const busy = engine?.status === 'thinking' || engine?.status === 'acting';
  return (
    <Box
      borderStyle="single"
      borderColor={THEME.accent}
      paddingX={1}
      justifyContent="space-between"
    >
      <Box gap={1}>
        {busy && (
          <Text color={THEME.primary}>{SPINNER_FRAMES[spinnerFrame % SPINNER_FRAMES.length]}</Text>
        )}
        <Text bold color={THEME.primary}>
          STEPWISE
        </Text>
      </Box>
      <Box gap={2}>
        {engine && engine.status !== 'idle' && (
          <Text color={statusColor(engine.status)}>
            {engine.status}
            {engine.iteration > 0 ? ` · step ${engine.iteration}` : ''}
          </Text>
        )}
        <Text color={THEME.accent}>model: {model}</Text>
      </Box>
    </Box>
  );
};

function statusColor(status: EngineStatus): string {
  switch (status) {
    case 'awaiting_approval':
    case 'paused':
      return THEME.warning;
    case 'complete':
      return THEME.success;
    case 'failed':
      return THEME.error;
    case 'idle':
      return THEME.dim;
    default:
      return THEME.primary;
  }
}
