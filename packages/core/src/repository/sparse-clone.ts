import { z } from 'zod';
import { readFileSync } from 'fs';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join, relative, sep } from 'node:path';
import { fileURLToPath } from 'url';
import { minimatch } from 'minimatch';
import type { TerraformRepository } from '../analysis/analysis-types.js';
import { CONFIG } from '../utils/config.js';
import { debugLog } from '../utils/debug-log.js';
import { validate } from '../utils/validation.js';
import { runGit } from './git.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const DEFAULT_SPARSE_PATTERNS_PATH = join(__dirname, '..', 'sparse-patterns');

const GIT_SETUP_TIMEOUT = 30_000;
const TERRAFORM_PATTERNS = ['*.tf', '*.tfvars'];
const DOCUMENTATION_PATTERNS = ['*.md', 'README*', 'LICENSE*'];

export interface ClonedRepository {
  repository: TerraformRepository;
  /** Removes the temporary checkout. */
  cleanup(): Promise<void>;
}

export interface SparseCloneOptions {
  timeout?: number;
  patternsPath?: string;
}

export function loadSparsePatterns(filePath: string = DEFAULT_SPARSE_PATTERNS_PATH): string[] {
  const content = readFileSync(filePath, 'utf-8');
  const patterns = content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
  return validate(z.array(z.string().min(1)), patterns, 'sparse patterns');
}

/** `owner_repo` from a repository URL, or `unknown_repo` when the path is too short. */
export function extractRepositoryName(url: string): string {
  const parts = url
    .replace(/\/+$/, '')
    .replace(/\.git$/, '')
    .split('/');
  const owner = parts.at(-2);
  const repo = parts.at(-1);
  if (parts.length < 2 || !owner || !repo) return 'unknown_repo';
  return `${owner}_${repo}`;
}

export function classifyRepositoryFiles(paths: string[]): {
  terraform: string[];
  documentation: string[];
} {
  const matchesAny = (path: string, patterns: string[]) =>
    patterns.some((pattern) => minimatch(path, pattern, { matchBase: true, dot: true }));
  return {
    terraform: paths.filter((path) => matchesAny(path, TERRAFORM_PATTERNS)),
    documentation: paths.filter((path) => matchesAny(path, DOCUMENTATION_PATTERNS)),
  };
}

async function listFiles(root: string, dir = root): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name === '.git') continue;
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, fullPath)));
    } else if (entry.isFile()) {
      files.push(relative(root, fullPath).split(sep).join('/'));
    }
  }
  return files.sort();
}

async function readContents(root: string, paths: string[]): Promise<Record<string, string>> {
  const contents: Record<string, string> = {};
  for (const path of paths) {
    try {
      contents[path] = await readFile(join(root, path), 'utf-8');
    } catch (error) {
      debugLog('clone', `Failed to read ${path}`, { error: String(error) });
    }
  }
  return contents;
}

/**
 * Shallow sparse checkout of Terraform and documentation files. Resolves to
 * null (with the checkout already removed) when no Terraform files came down.
 */
export async function cloneRepositorySparse(
  url: string,
  name: string,
  options: SparseCloneOptions = {}
): Promise<ClonedRepository | null> {
  const patterns = loadSparsePatterns(options.patternsPath);
  const timeout = options.timeout ?? CONFIG.analysis.cloneTimeout;
  const clonePath = await mkdtemp(join(tmpdir(), `tfmap-${name}-`));
  const cleanup = () => rm(clonePath, { recursive: true, force: true });

  try {
    debugLog('clone', `Cloning ${name}`, { clonePath, timeout });
    await runGit(['init'], clonePath, GIT_SETUP_TIMEOUT);
    await runGit(['remote', 'add', 'origin', url], clonePath, GIT_SETUP_TIMEOUT);
    await runGit(['config', 'core.sparseCheckout', 'true'], clonePath, GIT_SETUP_TIMEOUT);
    const infoDir = join(clonePath, '.git', 'info');
    await mkdir(infoDir, { recursive: true });
    await writeFile(join(infoDir, 'sparse-checkout'), patterns.join('\n'));
    await runGit(['pull', '--depth=1', 'origin', 'HEAD'], clonePath, timeout);

    const { terraform, documentation } = classifyRepositoryFiles(await listFiles(clonePath));
    if (terraform.length === 0) {
      debugLog('clone', `No Terraform files found in ${name}`);
      await cleanup();
      return null;
    }

    return {
      repository: {
        name,
        url,
        clonePath,
        terraformFiles: await readContents(clonePath, terraform),
        documentationFiles: await readContents(clonePath, documentation),
      },
      cleanup,
    };
  } catch (error) {
    await cleanup();
    throw error;
  }
}
