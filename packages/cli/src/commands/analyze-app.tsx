import type React from 'react';
import { useEffect, useState } from 'react';
import { Box, useApp } from 'ink';
import { runAnalyze } from '@tfmap/core';
import type { AnalyzeOptions, AnalyzeResult } from '@tfmap/core';
import { usePipeline } from '../ui/hooks/use-pipeline.js';
import { StagePipeline } from '../ui/components/stage-pipeline.js';
import { AnalysisSummary } from '../ui/components/analysis-summary.js';
import { ErrorDisplay } from '../ui/components/error-display.js';
import { renderApp } from '../ui/app.js';

export interface ResultRef<T> {
  value?: T;
  error?: unknown;
}

function AnalyzeInkApp({
  options,
  resultRef,
}: {
  options: AnalyzeOptions;
  resultRef: ResultRef<AnalyzeResult>;
}): React.ReactElement {
  const { steps, reporter } = usePipeline();
  const [result, setResult] = useState<AnalyzeResult | null>(null);
  const [error, setError] = useState<unknown>(null);
  const { exit } = useApp();

  useEffect(() => {
    void (async () => {
      try {
        const r = await runAnalyze(
          {
            ...options,
            onAuthorizationUrl: (url) => {
              reporter.info(`Open this URL to sign in: ${url}`);
            },
          },
          reporter
        );
        resultRef.value = r;
        setResult(r);
      } catch (e: unknown) {
        resultRef.error = e;
        setError(e);
      }
    })();
    // eslint-disable-next-line react-hooks/exhaustive-deps -- run pipeline once on mount
  }, []);

  useEffect(() => {
    if (result || error) exit();
  }, [result, error, exit]);

  return (
    <Box flexDirection="column">
      <StagePipeline steps={steps} />
      {result && <AnalysisSummary result={result} dryRun={options.dryRun ?? false} />}
      {error ? <ErrorDisplay error={error} /> : null}
    </Box>
  );
}

export function rethrow(error: unknown): never {
  if (error instanceof Error) throw error;
  throw new Error(String(error));
}

export async function runAnalyzeApp(options: AnalyzeOptions): Promise<AnalyzeResult | undefined> {
  const resultRef: ResultRef<AnalyzeResult> = {};
  await renderApp(<AnalyzeInkApp options={options} resultRef={resultRef} />);
  if (resultRef.error) rethrow(resultRef.error);
  return resultRef.value;
}
