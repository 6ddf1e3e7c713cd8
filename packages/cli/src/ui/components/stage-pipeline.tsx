import React from 'react';
import { Box, Static } from 'ink';
import { ProgressStep } from './progress-step.js';
import type { PipelineStep } from '../hooks/use-pipeline.js';

interface Props {
  steps: PipelineStep[];
}

/**
 * Settled steps go to Ink's <Static> output; only a running step at the end
 * stays live with a spinner. A running step that was never settled is printed
 * as abandoned.
 */
export function StagePipeline({ steps }: Props): React.ReactElement {
  const last = steps.at(-1);
  const live = last?.status === 'running' ? last : undefined;
  const settled = live ? steps.slice(0, -1) : steps;

  return (
    <Box flexDirection="column">
      <Static items={settled}>
        {(step) => (
          <ProgressStep key={step.id} message={step.message} status={step.status} live={false} />
        )}
      </Static>
      {live ? <ProgressStep message={live.message} status={live.status} live /> : null}
    </Box>
  );
}
