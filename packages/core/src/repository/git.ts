import { execFile } from 'child_process';
import { promisify } from 'node:util';
import { TfmapError, ErrorCode } from '../errors.js';
import { errorMessage } from '../utils/error-utils.js';

const execFileAsync = promisify(execFile);

export function stripUrlCredentials(message: string): string {
  return message.replace(/(https?:\/\/)[^@/\s]+@/g, '$1');
}

/** Run a git subcommand in `cwd`, failing with IO_CLONE_FAILED. */
export async function runGit(args: string[], cwd: string, timeout: number): Promise<void> {
  try {
    await execFileAsync('git', args, { cwd, timeout });
  } catch (error) {
    const message = stripUrlCredentials(errorMessage(error));
    const command = stripUrlCredentials(`git ${args.join(' ')}`);
    throw new TfmapError(
      `Git command failed (${command}): ${message}`,
      ErrorCode.IO_CLONE_FAILED,
      'Could not clone the repository. Check the URL and that git is installed.',
      { command }
    );
  }
}
