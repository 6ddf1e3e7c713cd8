import { Command } from 'commander';
import chalk from 'chalk';
import { describeConfig, validate } from '@tfmap/core';
import type { ConfigEntry } from '@tfmap/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ConfigInfoOptionsSchema } from '../utils/command-schemas.js';
import { formatJson } from '../utils/cli-helpers.js';

export function formatConfigEntries(entries: ConfigEntry[]): string {
  const width = Math.max(...entries.map((e) => e.label.length));
  return entries.map((e) => `${chalk.bold(`${e.label}:`.padEnd(width + 1))} ${e.value}`).join('\n');
}

export function createConfigInfoCommand(): Command {
  return new Command('config-info')
    .description('Show the effective configuration (secrets are not printed)')
    .option('--format <format>', 'Result format (console, json)', 'console')
    .action((options: unknown) => {
      try {
        const validated = validate(ConfigInfoOptionsSchema, options, 'command options');
        const entries = describeConfig();
        if (validated.format === 'json') {
          console.log(formatJson(Object.fromEntries(entries.map((e) => [e.label, e.value]))));
          return;
        }
        console.log(formatConfigEntries(entries));
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
