import type React from 'react';
import { Box, Text } from 'ink';
import { TfmapError } from '@tfmap/core';
import { HINTS, displayContext } from '../../utils/error-handler.js';

interface Props {
  error: unknown;
}

export function ErrorDisplay({ error }: Props): React.ReactElement {
  if (error instanceof TfmapError) {
    const entries = displayContext(error);
    const hints = HINTS[error.code];

    return (
      <Box flexDirection="column" marginTop={1}>
        <Text color="red">✗ {error.userMessage}</Text>
        {entries.length > 0 && (
          <Box flexDirection="column" marginLeft={2}>
            {entries.map(([key, value]) => (
              <Text key={key} dimColor>
                {key}: {value}
              </Text>
            ))}
          </Box>
        )}
        <Text dimColor> Code: {error.code}</Text>
        {hints && hints.length > 0 && (
          <Box flexDirection="column" marginTop={1}>
            <Text>Hints:</Text>
            {hints.map((hint) => (
              <Text key={hint} color="blue">
                {'  • '}
                {hint}
              </Text>
            ))}
          </Box>
        )}
      </Box>
    );
  }

  if (error instanceof Error) {
    return <Text color="red">✗ {error.message}</Text>;
  }

  return <Text color="red">✗ Something went wrong unexpectedly: {String(error)}</Text>;
}
