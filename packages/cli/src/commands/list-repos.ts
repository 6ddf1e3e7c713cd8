import { Command } from 'commander';
import chalk from 'chalk';
import { runListRepos, validate } from '@tfmap/core';
import type { ListedRepository, ListReposResult } from '@tfmap/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ListReposOptionsSchema, ThreatModelIdSchema } from '../utils/command-schemas.js';
import { ConsoleProgress, Logger, formatJson, formatTable } from '../utils/cli-helpers.js';

export function formatRepositories(result: ListReposResult): string {
  const github = result.repositories.filter((r) => r.isGitHub).length;
  const table = formatTable<ListedRepository>(result.repositories, [
    { header: 'Name', value: (r) => r.name },
    { header: 'Type', value: (r) => r.type },
    { header: 'GitHub', value: (r) => (r.isGitHub ? 'yes' : 'no') },
    { header: 'URL', value: (r) => r.url },
  ]);
  return [
    chalk.bold(`Threat model: ${result.threatModel.name}`),
    '',
    table,
    '',
    `${String(result.repositories.length)} repositories, ${String(github)} on GitHub`,
  ].join('\n');
}

export function createListReposCommand(): Command {
  return new Command('list-repos')
    .description('List the repositories linked to a threat model')
    .argument('<threat-model-id>', 'TMI threat model ID')
    .option('--format <format>', 'Result format (console, json)', 'console')
    .action(async (id: string, options: unknown) => {
      try {
        const threatModelId = validate(ThreatModelIdSchema, id, 'threat model ID');
        const validated = validate(ListReposOptionsSchema, options, 'command options');
        const json = validated.format === 'json';
        const result = await runListRepos(
          {
            threatModelId,
            onAuthorizationUrl: (url) => {
              if (json) console.error(`Open this URL to sign in: ${url}`);
              else Logger.info(`Open this URL to sign in: ${url}`);
            },
          },
          json ? undefined : new ConsoleProgress()
        );
        console.log(json ? formatJson(result) : `\n${formatRepositories(result)}`);
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
