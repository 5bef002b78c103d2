import React from 'react';
import { Box, Text, useInput } from 'ink';
import type { PendingApproval } from '../engine.bridge.js';
import { THEME } from '../theme.js';

interface ApprovalPromptProps {
  pending: PendingApproval;
  onAnswer: (approved: boolean) => void;
}

export const ApprovalPrompt: React.FC<ApprovalPromptProps> = ({ pending, onAnswer }) => {
  useInput((input, key) => {
    if (input === 'y' || input === 'Y') {
      onAnswer(true);
    } else if (input === 'n' || input === 'N' || key.escape) {
      onAnswer(false);
    }
  });

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={THEME.warning} paddingX={1}>
      <Text bold color={THEME.warning}>
        Run tool {pending.toolName}?
      </Text>
      {pending.description && <Text color={THEME.textDim}>{pending.description}</Text>}
      <Text color={THEME.text}>{JSON.stringify(pending.args, null, 2)}</Text>
      <Box marginTop={1}>
        <Text bold color={THEME.success}>
          y
        </Text>
        <Text color={THEME.textDim}> approve · </Text>
        <Text bold color={THEME.error}>
          n
        </Text>
        <Text color={THEME.textDim}> reject</Text>
      </Box>
    </Box>
  );
};
