import React, { useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';
import { THEME } from '../theme.js';

export type InputMode =
  | 'idle' // accept tasks or slash commands
  | 'running' // task executing; input becomes a note for the agent
  | 'completed'; // show completion, accept next task

interface InputBarProps {
  mode: InputMode;
  onSubmit: (value: string) => void;
  completionMessage?: string;
}

export const InputBar: React.FC<InputBarProps> = ({ mode, onSubmit, completionMessage }) => {
  const [value, setValue] = useState('');

  const handleSubmit = (val: string) => {
    const trimmed = val.trim();
    setValue('');
    if (trimmed) onSubmit(trimmed);
  };

  const placeholder =
    mode === 'running'
      ? 'Task in progress · type a note for the agent · Ctrl+C to quit'
      : mode === 'completed'
        ? `${completionMessage ?? 'Task finished'} · type next task or /help`
        : 'Type a task or /help…';

  const borderColor = mode === 'running' ? THEME.dimBorder : THEME.accent;

  return (
    <Box borderStyle="single" borderColor={borderColor} paddingX={1}>
      <Text color={THEME.accent} bold>
        {'> '}
      </Text>
      <TextInput value={value} onChange={setValue} onSubmit={handleSubmit} placeholder={placeholder} />
    </Box>
  );
};
