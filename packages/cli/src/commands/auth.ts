import { Command } from 'commander';
import { clearAuth, runAuth } from '@tfmap/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ConsoleProgress, Logger } from '../utils/cli-helpers.js';

function printAuthorizationUrl(url: string): void {
  Logger.info(`Opening your browser to sign in. If it does not open, visit:\n   ${url}`);
}

export function createAuthCommand(): Command {
  return new Command('auth')
    .description('Sign in to TMI and cache the token')
    .action(async () => {
      try {
        await runAuth({ onAuthorizationUrl: printAuthorizationUrl }, new ConsoleProgress());
        Logger.success('Authentication successful');
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}

export function createClearAuthCommand(): Command {
  return new Command('clear-auth')
    .description('Remove the cached TMI token')
    .action(async () => {
      try {
        const path = await clearAuth();
        Logger.success(`Cleared cached token at ${path}`);
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
