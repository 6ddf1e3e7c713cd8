import { TfmapError, ErrorCode } from '@tfmap/core';
import { Logger } from './cli-helpers.js';

export const HINTS: Partial<Record<ErrorCode, string[]>> = {
  [ErrorCode.CONFIG_INVALID]: [
    'Set the API key for the selected AI_PROVIDER (ANTHROPIC_API_KEY, OPENAI_API_KEY or GEMINI_API_KEY)',
    'Store settings in a .env file and run "tfmap config-info" to check them',
  ],
  [ErrorCode.AUTH_OAUTH_FAILED]: [
    'Run "tfmap auth" to sign in again',
    'Make sure TMI_CALLBACK_PORT is free on this machine',
  ],
  [ErrorCode.AUTH_PLATFORM_FAILURE]: [
    'Your TMI session may have expired: run "tfmap clear-auth" then "tfmap auth"',
    'Confirm GITHUB_TOKEN is still valid if private repositories are involved',
  ],
  [ErrorCode.IO_CLONE_FAILED]: [
    'Check that git is installed and on PATH',
    'Private repositories need credentials git can use',
  ],
  [ErrorCode.NET_ERROR]: ['Verify your network connection', 'Retry after a short wait'],
  [ErrorCode.PROVIDER_RATE_LIMITED]: ['Pause for a few minutes, then retry'],
  [ErrorCode.PROVIDER_TIMEOUT]: ['Raise the provider timeout, e.g. ANTHROPIC_TIMEOUT=300000'],
  [ErrorCode.PROVIDER_SAFETY_BLOCK]: ['Content was rejected by the AI provider safety filters'],
  [ErrorCode.PLATFORM_NOT_FOUND]: [
    'Add GitHub repositories to the threat model in TMI',
    'Run "tfmap list-repos <threat-model-id>" to see what is linked',
  ],
  [ErrorCode.ANALYSIS_NO_RESULTS]: [
    'Check that the repositories contain .tf files',
    'Run with VERBOSE=true for details',
  ],
  [ErrorCode.DIAGRAM_NO_DATA]: ['The input needs a JSON object with components and flows'],
};

const SENSITIVE_KEYS = new Set([
  'token',
  'apikey',
  'api_key',
  'secret',
  'password',
  'authorization',
  'credential',
]);

export const REDACTED = '***REDACTED***';

/** Context entries to show, with sensitive values masked and empty ones dropped. */
export function displayContext(error: TfmapError): [string, string][] {
  return Object.entries(error.context)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([key, value]): [string, string] => [
      key,
      SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : String(value),
    ]);
}

export const ErrorHandler = {
  formatError(error: unknown): void {
    if (error instanceof TfmapError) {
      Logger.fail(error.userMessage);
      const entries = displayContext(error);
      if (entries.length > 0) {
        console.error('   Extra details:');
        for (const [key, value] of entries) {
          console.error(`   ${key}: ${value}`);
        }
      }
      console.error(`   Code: ${error.code}`);
      const hints = HINTS[error.code];
      if (hints && hints.length > 0) {
        console.error('\n💡 Hints:');
        hints.forEach((hint) => {
          Logger.info(`• ${hint}`);
        });
      }
    } else if (error instanceof Error) {
      Logger.fail(error.message);
    } else {
      Logger.fail(`Something went wrong unexpectedly: ${String(error)}`);
    }
  },
  getExitCode(error: unknown): number {
    if (error instanceof TfmapError) {
      switch (error.code) {
        case ErrorCode.CONFIG_MISSING:
        case ErrorCode.CONFIG_INVALID:
        case ErrorCode.AUTH_KEY_MISSING:
        case ErrorCode.INPUT_INVALID:
          return 2;
        case ErrorCode.IO_FILE_NOT_FOUND:
        case ErrorCode.IO_PERMISSION_DENIED:
        case ErrorCode.IO_CLONE_FAILED:
          return 3;
        case ErrorCode.NET_ERROR:
        case ErrorCode.PROVIDER_ERROR:
        case ErrorCode.PROVIDER_TIMEOUT:
        case ErrorCode.PROVIDER_RATE_LIMITED:
        case ErrorCode.PROVIDER_INVALID_RESPONSE:
        case ErrorCode.PROVIDER_SAFETY_BLOCK:
          return 4;
        case ErrorCode.AUTH_OAUTH_FAILED:
        case ErrorCode.AUTH_PLATFORM_FAILURE:
        case ErrorCode.PLATFORM_NOT_FOUND:
        case ErrorCode.PLATFORM_INVALID_URL:
          return 5;
        default:
          return 1;
      }
    }
    return 1;
  },
  handleCliError(error: unknown): never {
    ErrorHandler.formatError(error);
    process.exit(ErrorHandler.getExitCode(error));
  },
} as const;
