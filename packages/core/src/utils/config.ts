import * as dotenv from 'dotenv';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { ANTHROPIC_MODELS } from '../providers/anthropic/models.js';
import { OPENAI_MODELS } from '../providers/openai/models.js';
import { GEMINI_MODELS } from '../providers/gemini/models.js';
dotenv.config();
const ProviderSettingsSchema = (defaults: { analysisModel: string; extractionModel: string }) =>
  z.object({
    apiKey: z.string().optional(),
    timeout: z.number().int().min(1000).max(600000).default(120000),
    analysisModel: z.string().default(defaults.analysisModel),
    extractionModel: z.string().default(defaults.extractionModel),
  });
const ConfigSchema = z.object({
  ai: z.object({
    provider: z.enum(['anthropic', 'openai', 'gemini']).default('anthropic'),
  }),
  anthropic: ProviderSettingsSchema({
    analysisModel: ANTHROPIC_MODELS.ANALYSIS,
    extractionModel: ANTHROPIC_MODELS.EXTRACTION,
  }),
  openai: ProviderSettingsSchema({
    analysisModel: OPENAI_MODELS.ANALYSIS,
    extractionModel: OPENAI_MODELS.EXTRACTION,
  }),
  gemini: ProviderSettingsSchema({
    analysisModel: GEMINI_MODELS.ANALYSIS,
    extractionModel: GEMINI_MODELS.EXTRACTION,
  }),
  github: z.object({
    token: z.string().optional(),
    defaultTimeout: z.number().int().min(1000).max(300000).default(30000),
  }),
  tmi: z.object({
    serverUrl: z.url().default('https://api.tmi.dev'),
    oauthIdp: z.string().min(1).default('google'),
    callbackPort: z.number().int().min(1).max(65535).default(8888),
    authTimeout: z.number().int().min(1000).max(3600000).default(300000),
    cacheDir: z.string().min(1).default(join(homedir(), '.tfmap')),
  }),
  analysis: z.object({
    maxRepos: z.number().int().min(1).max(100).default(3),
    cloneTimeout: z.number().int().min(1000).max(3600000).default(300000),
    noteName: z.string().min(1).default('Terraform Analysis Report'),
    diagramName: z.string().min(1).default('Infrastructure Data Flow Diagram'),
    maxDocChars: z.number().int().min(100).max(100000).default(2000),
  }),
  debug: z.object({
    enabled: z.boolean().default(false),
    verbose: z.boolean().default(false),
  }),
  app: z.object({
    name: z.string().default('tfmap'),
    version: z.string().default('0.1.0'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

const ENV_MAP: Record<string, string> = {
  AI_PROVIDER: 'ai.provider',
  ANTHROPIC_API_KEY: 'anthropic.apiKey',
  ANTHROPIC_TIMEOUT: 'anthropic.timeout',
  ANTHROPIC_ANALYSIS_MODEL: 'anthropic.analysisModel',
  ANTHROPIC_EXTRACTION_MODEL: 'anthropic.extractionModel',
  OPENAI_API_KEY: 'openai.apiKey',
  OPENAI_TIMEOUT: 'openai.timeout',
  OPENAI_ANALYSIS_MODEL: 'openai.analysisModel',
  OPENAI_EXTRACTION_MODEL: 'openai.extractionModel',
  GEMINI_API_KEY: 'gemini.apiKey',
  GEMINI_TIMEOUT: 'gemini.timeout',
  GEMINI_ANALYSIS_MODEL: 'gemini.analysisModel',
  GEMINI_EXTRACTION_MODEL: 'gemini.extractionModel',
  GITHUB_TOKEN: 'github.token',
  GITHUB_TIMEOUT: 'github.defaultTimeout',
  TMI_SERVER_URL: 'tmi.serverUrl',
  TMI_OAUTH_IDP: 'tmi.oauthIdp',
  TMI_CALLBACK_PORT: 'tmi.callbackPort',
  TMI_AUTH_TIMEOUT: 'tmi.authTimeout',
  TMI_CACHE_DIR: 'tmi.cacheDir',
  MAX_REPOS: 'analysis.maxRepos',
  CLONE_TIMEOUT: 'analysis.cloneTimeout',
  ANALYSIS_NOTE_NAME: 'analysis.noteName',
  DIAGRAM_NAME: 'analysis.diagramName',
  MAX_DOC_CHARS: 'analysis.maxDocChars',
  DEBUG_MODE: 'debug.enabled',
  VERBOSE: 'debug.verbose',
};

type Coercer = (raw: string) => unknown;

const toNumber: Coercer = (raw) => {
  const n = parseInt(raw, 10);
  return isNaN(n) ? raw : n;
};
const toBoolean: Coercer = (raw) => raw.toLowerCase() === 'true';
const identity: Coercer = (raw) => raw;

const COERCE_MAP: Record<string, Coercer> = {
  'debug.enabled': toBoolean,
  'debug.verbose': toBoolean,
  'anthropic.timeout': toNumber,
  'openai.timeout': toNumber,
  'gemini.timeout': toNumber,
  'github.defaultTimeout': toNumber,
  'tmi.callbackPort': toNumber,
  'tmi.authTimeout': toNumber,
  'analysis.maxRepos': toNumber,
  'analysis.cloneTimeout': toNumber,
  'analysis.maxDocChars': toNumber,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const segments = dotPath.split('.');
  let current: Record<string, unknown> = obj;
  for (let i = 0; i < segments.length - 1; i++) {
    const seg = segments[i];
    if (!seg) continue;
    const next = current[seg];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[seg] = created;
      current = created;
    }
  }
  const lastKey = segments.at(-1);
  if (lastKey) {
    current[lastKey] = value;
  }
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {
    ai: {},
    anthropic: {},
    openai: {},
    gemini: {},
    github: {},
    tmi: {},
    analysis: {},
    debug: {},
    app: {},
  };

  for (const [envVar, dotPath] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined || raw === '') continue;
    const coerce = COERCE_MAP[dotPath] ?? identity;
    setNestedValue(config, dotPath, coerce(raw));
  }

  return config;
}

/**
 * Commands that call a model need the selected provider's key. Checked on use
 * so that offline commands work without one.
 */
export function assertProviderConfigured(config: Config = CONFIG): void {
  if (config.debug.enabled) return;
  const provider = config.ai.provider;
  if (!config[provider].apiKey) {
    throw new ConfigurationError(
      `Configuration check failed: ${provider.toUpperCase()}_API_KEY must be set when AI_PROVIDER is ${provider}`,
      'environment'
    );
  }
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return ConfigSchema.parse(loadConfigFromEnv(env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const summary = error.issues
        .map((issue, idx) => `${String(idx + 1)}. ${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Config validation failed: ${summary}`, 'validation');
    }
    throw error;
  }
}

export const CONFIG = createConfig();
