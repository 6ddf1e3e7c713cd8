import { z } from 'zod';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { debugLog } from '../utils/debug-log.js';
import { errorMessage } from '../utils/error-utils.js';

const CachedTokenSchema = z.object({
  token: z.string().min(1),
  expires_at: z.iso.datetime({ offset: true }),
});

/** Access token persisted as `{ token, expires_at }` JSON. */
export class TokenCache {
  constructor(
    readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async save(token: string, expiresInSeconds: number): Promise<void> {
    const expiresAt = new Date(this.now().getTime() + expiresInSeconds * 1000);
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(
      this.filePath,
      JSON.stringify({ token, expires_at: expiresAt.toISOString() }),
      { mode: 0o600 }
    );
    debugLog('auth', `Token cached to ${this.filePath}`);
  }

  /** The cached token while it is unexpired; null when absent, expired or unreadable. */
  async load(): Promise<string | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      debugLog('auth', 'No cached token', { error: errorMessage(error) });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      debugLog('auth', 'Cached token file is not valid JSON', { error: errorMessage(error) });
      return null;
    }
    const result = CachedTokenSchema.safeParse(parsed);
    if (!result.success) {
      debugLog('auth', 'Cached token file has an unexpected shape');
      return null;
    }

    if (this.now().getTime() >= new Date(result.data.expires_at).getTime()) {
      debugLog('auth', 'Cached token expired');
      return null;
    }
    return result.data.token;
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
