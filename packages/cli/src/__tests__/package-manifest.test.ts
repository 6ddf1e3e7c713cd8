import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const ManifestSchema = z.object({
  bin: z.record(z.string(), z.string()).optional(),
  main: z.string().optional(),
  types: z.string().optional(),
  exports: z.unknown().optional(),
  scripts: z.record(z.string(), z.string()).optional(),
});

function readManifest(relative: string) {
  const path = fileURLToPath(new URL(relative, import.meta.url));
  return ManifestSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

describe('package manifests', () => {
  const root = readManifest('../../../../package.json');
  const core = readManifest('../../../core/package.json');
  const cli = readManifest('../../package.json');

  it('should load core from its build output at runtime and from sources for types', () => {
    expect(core.exports).toEqual({
      '.': { types: './src/index.ts', default: './dist/index.js' },
    });
    expect(core.main).toBe('./dist/index.js');
  });

  it('should point the tfmap binary at the compiled cli entry', () => {
    expect(root.bin).toEqual({ tfmap: 'packages/cli/dist/cli.js' });
    expect(cli.bin).toEqual({ tfmap: './dist/cli.js' });
  });

  it('should build core before the cli and copy the runtime assets beside it', () => {
    const build = root.scripts?.build ?? '';
    expect(build.split(' && ')).toEqual([
      'tsc -b packages/cli/tsconfig.build.json',
      'cp -r packages/core/src/analysis/prompts packages/core/dist/analysis/',
      'cp packages/core/src/sparse-patterns packages/core/dist/',
    ]);
  });
});
