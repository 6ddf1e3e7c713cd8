import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { StepStatus } from '../hooks/use-pipeline.js';

interface Props {
  message: string;
  status: StepStatus;
  live: boolean;
}

const ICONS: Record<Exclude<StepStatus, 'running' | 'section'>, string> = {
  success: '✓',
  fail: '✗',
  warn: '⚠',
  info: 'ℹ',
};

const COLORS: Record<Exclude<StepStatus, 'running' | 'section'>, string> = {
  success: 'green',
  fail: 'red',
  warn: 'yellow',
  info: 'blue',
};

export function ProgressStep({ message, status, live }: Props): React.ReactElement {
  if (status === 'section') {
    return <Text bold color="cyan">{`\n── ${message} ──`}</Text>;
  }

  if (status === 'running') {
    if (!live) {
      return <Text dimColor>… {message}</Text>;
    }
    return (
      <Box>
        <Text color="cyan">
          <Spinner type="dots" />
        </Text>
        <Text color="cyan"> {message}</Text>
      </Box>
    );
  }

  return (
    <Text color={COLORS[status]}>
      {ICONS[status]} {message}
    </Text>
  );
}
