import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TokenCache } from '../token-cache.js';

describe('TokenCache', () => {
  let dir: string;
  let now: Date;
  const clock = () => now;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tfmap-cache-test-'));
    now = new Date('2026-03-01T10:00:00.000Z');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the token with its expiry', async () => {
    const cache = new TokenCache(join(dir, 'nested', 'token.json'), clock);
    await cache.save('test-token', 3600);

    const stored: unknown = JSON.parse(await readFile(join(dir, 'nested', 'token.json'), 'utf-8'));
    expect(stored).toEqual({ token: 'test-token', expires_at: '2026-03-01T11:00:00.000Z' });
  });

  it('should return the token until it expires', async () => {
    const cache = new TokenCache(join(dir, 'token.json'), clock);
    await cache.save('test-token', 60);

    now = new Date('2026-03-01T10:00:59.000Z');
    await expect(cache.load()).resolves.toBe('test-token');

    now = new Date('2026-03-01T10:01:00.000Z');
    await expect(cache.load()).resolves.toBeNull();
  });

  it('should return null without a cache file', async () => {
    const cache = new TokenCache(join(dir, 'missing.json'), clock);
    await expect(cache.load()).resolves.toBeNull();
  });

  it('should return null for a corrupt cache file', async () => {
    await writeFile(join(dir, 'token.json'), '{not json');
    const cache = new TokenCache(join(dir, 'token.json'), clock);
    await expect(cache.load()).resolves.toBeNull();
  });

  it('should return null when fields are missing', async () => {
    await writeFile(join(dir, 'token.json'), JSON.stringify({ token: 'test-token' }));
    const cache = new TokenCache(join(dir, 'token.json'), clock);
    await expect(cache.load()).resolves.toBeNull();
  });

  it('should delete the cache file and tolerate a second clear', async () => {
    const cache = new TokenCache(join(dir, 'token.json'), clock);
    await cache.save('test-token', 60);

    await cache.clear();
    await cache.clear();
    expect(existsSync(join(dir, 'token.json'))).toBe(false);
  });
});
