import { Command } from 'commander';
import { runAnalyze, validate } from '@tfmap/core';
import type { AnalyzeOptions, AnalyzeResult } from '@tfmap/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { AnalyzeOptionsSchema, ThreatModelIdSchema } from '../utils/command-schemas.js';
import type { AnalyzeCommandOptions } from '../utils/command-schemas.js';
import { formatJson } from '../utils/cli-helpers.js';

export function toAnalyzeOptions(
  threatModelId: string,
  options: AnalyzeCommandOptions
): AnalyzeOptions {
  return {
    threatModelId,
    maxRepos: options.maxRepos,
    dryRun: options.dryRun,
    outputFile: options.output,
    forceAuth: options.forceAuth,
    skipDiagram: options.skipDiagram,
  };
}

/** JSON document for `--format json`; the report itself stays in markdown. */
export function summarizeResult(result: AnalyzeResult): Record<string, unknown> {
  return {
    threatModel: { id: result.threatModel.id, name: result.threatModel.name },
    repositories: result.analyses.map((a) => ({
      name: a.repoName,
      url: a.repoUrl,
      success: a.success,
    })),
    skipped: result.skipped,
    note: result.note ? { id: result.note.id, name: result.note.name } : null,
    diagram: result.diagram
      ? {
          id: result.diagram.diagram.id,
          name: result.diagram.diagram.name,
          cellCount: result.diagram.cellCount,
        }
      : null,
    report: result.report,
  };
}

export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description(
      'Analyze the Terraform repositories of a threat model and publish a report and diagram to TMI'
    )
    .argument('<threat-model-id>', 'TMI threat model ID')
    .option('--max-repos <n>', 'Maximum number of repositories to analyze')
    .option('--dry-run', 'Build the report without writing a note or diagram to TMI')
    .option('--output <path>', 'Also save the markdown report to a file')
    .option('--force-auth', 'Sign in again even if a cached token is valid')
    .option('--skip-diagram', 'Publish the note only')
    .option('--format <format>', 'Result format (console, json)', 'console')
    .action(async (id: string, options: unknown) => {
      let validated: AnalyzeCommandOptions;
      let analyzeOptions: AnalyzeOptions;
      try {
        validated = validate(AnalyzeOptionsSchema, options, 'command options');
        analyzeOptions = toAnalyzeOptions(
          validate(ThreatModelIdSchema, id, 'threat model ID'),
          validated
        );
      } catch (error) {
        ErrorHandler.formatError(error);
        process.exitCode = ErrorHandler.getExitCode(error);
        return;
      }

      if (validated.format === 'json') {
        try {
          const result = await runAnalyze({
            ...analyzeOptions,
            onAuthorizationUrl: (url) => {
              console.error(`Open this URL to sign in: ${url}`);
            },
          });
          console.log(formatJson(summarizeResult(result)));
        } catch (error) {
          ErrorHandler.handleCliError(error);
        }
        return;
      }

      try {
        const { runAnalyzeApp } = await import('./analyze-app.js');
        const result = await runAnalyzeApp(analyzeOptions);
        if (result && validated.dryRun && !validated.output) {
          console.log(`\n${result.report}`);
        }
      } catch (error) {
        process.exitCode = ErrorHandler.getExitCode(error);
      }
    });
}
