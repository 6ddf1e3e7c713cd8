import type React from 'react';
import { Box, Text } from 'ink';
import type { AnalyzeResult } from '@tfmap/core';

interface Props {
  result: AnalyzeResult;
  dryRun: boolean;
}

export function AnalysisSummary({ result, dryRun }: Props): React.ReactElement {
  const succeeded = result.analyses.filter((a) => a.success).length;

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold color="cyan">
        ── Summary: {result.threatModel.name} ──
      </Text>
      <Text>
        {' '}
        Repositories analyzed: {String(result.analyses.length)} ({String(succeeded)} successful)
      </Text>
      {result.skipped.length > 0 && (
        <Box flexDirection="column">
          <Text> Skipped:</Text>
          {result.skipped.map((s) => (
            <Text key={s.url} dimColor>
              {'   '}
              {s.name}: {s.reason}
            </Text>
          ))}
        </Box>
      )}
      {result.note && <Text color="green"> Note: {result.note.name} ({result.note.id})</Text>}
      {result.diagram && (
        <Text color="green">
          {' '}
          Diagram: {result.diagram.diagram.name} ({String(result.diagram.cellCount)} cells)
        </Text>
      )}
      {dryRun && <Text color="yellow"> Dry run: nothing was written to TMI.</Text>}
    </Box>
  );
}
