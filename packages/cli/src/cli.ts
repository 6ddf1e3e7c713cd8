#!/usr/bin/env node
import { Command } from 'commander';
import { CONFIG } from '@tfmap/core';
import { Logger } from './utils/cli-helpers.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createAuthCommand, createClearAuthCommand } from './commands/auth.js';
import { createListReposCommand } from './commands/list-repos.js';
import { createConfigInfoCommand } from './commands/config-info.js';
import { createDiagramCommand } from './commands/diagram.js';

function setupSignalHandlers(): void {
  const handleShutdown = (signal: string) => {
    Logger.warn(`Received ${signal}, shutting down...`);
    process.exit(130);
  };
  process.on('SIGINT', () => handleShutdown('SIGINT'));
  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('uncaughtException', (error) => {
    Logger.fail('Uncaught Exception:');
    console.error(error);
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    Logger.fail('Unhandled Promise Rejection:');
    console.error('Reason:', reason);
    process.exit(1);
  });
}

function createProgram(): Command {
  const program = new Command();
  program
    .name(CONFIG.app.name)
    .description(
      'Analyze Terraform repositories linked to a TMI threat model and publish a data flow diagram'
    )
    .version(CONFIG.app.version);

  program.addCommand(createAnalyzeCommand());
  program.addCommand(createAuthCommand());
  program.addCommand(createListReposCommand());
  program.addCommand(createClearAuthCommand());
  program.addCommand(createConfigInfoCommand());
  program.addCommand(createDiagramCommand());
  return program;
}

setupSignalHandlers();
await createProgram().parseAsync();
