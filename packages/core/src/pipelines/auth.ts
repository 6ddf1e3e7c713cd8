import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { createAuthenticator } from '../auth/authenticator.js';

export interface AuthOptions {
  onAuthorizationUrl?: (url: string) => void;
}

/** Sign in again and cache the new token. */
export async function runAuth(options: AuthOptions = {}, progress?: ProgressReporter): Promise<string> {
  const p = progress ?? new SilentProgress();
  const authenticator = createAuthenticator({ onAuthorizationUrl: options.onAuthorizationUrl });
  p.start('Waiting for browser sign-in');
  await authenticator.getToken({ forceRefresh: true });
  p.succeed(`Token cached at ${authenticator.cache.filePath}`);
  return authenticator.cache.filePath;
}

/** Remove the cached token. Returns the path that was cleared. */
export async function clearAuth(): Promise<string> {
  const authenticator = createAuthenticator();
  await authenticator.clearCachedToken();
  return authenticator.cache.filePath;
}
