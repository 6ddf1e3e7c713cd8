import { useState, useCallback, useRef, useMemo } from 'react';
import type { ProgressReporter } from '@tfmap/core';

export type StepStatus = 'running' | 'success' | 'fail' | 'warn' | 'info' | 'section';

export interface PipelineStep {
  id: number;
  message: string;
  status: StepStatus;
}

/** Replace the most recent running step, or append when none is running. */
export function settleStep(
  steps: PipelineStep[],
  message: string,
  status: StepStatus,
  id: number
): PipelineStep[] {
  const idx = steps.findLastIndex((s) => s.status === 'running');
  const existing = steps[idx];
  if (!existing) return [...steps, { id, message, status }];
  const next = [...steps];
  next[idx] = { ...existing, message, status };
  return next;
}

/**
 * Steps shown by the stage pipeline, and a reporter that feeds them. The
 * reporter object is stable across renders so the async pipeline can hold it.
 */
export function usePipeline(): { steps: PipelineStep[]; reporter: ProgressReporter } {
  const [steps, setSteps] = useState<PipelineStep[]>([]);
  const nextId = useRef(0);

  const addStep = useCallback((message: string, status: StepStatus) => {
    const id = nextId.current++;
    setSteps((prev) => [...prev, { id, message, status }]);
  }, []);

  const settle = useCallback((message: string, status: StepStatus) => {
    const id = nextId.current++;
    setSteps((prev) => settleStep(prev, message, status, id));
  }, []);

  const reporter: ProgressReporter = useMemo(
    () => ({
      section(title: string) {
        addStep(title, 'section');
      },
      start(message: string) {
        addStep(message, 'running');
      },
      succeed(message: string) {
        settle(message, 'success');
      },
      fail(message: string) {
        settle(message, 'fail');
      },
      warn(message: string) {
        addStep(message, 'warn');
      },
      info(message: string) {
        addStep(message, 'info');
      },
    }),
    [addStep, settle]
  );

  return { steps, reporter };
}
