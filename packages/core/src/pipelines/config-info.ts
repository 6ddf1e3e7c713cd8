import type { Config } from '../utils/config.js';
import { CONFIG } from '../utils/config.js';

export interface ConfigEntry {
  label: string;
  value: string;
}

function configured(value: string | undefined): string {
  return value ? 'Configured' : 'Not configured';
}

/** Effective settings, with secrets reduced to whether they are set. */
export function describeConfig(config: Config = CONFIG): ConfigEntry[] {
  const provider = config.ai.provider;
  return [
    { label: 'TMI Server URL', value: config.tmi.serverUrl },
    { label: 'OAuth IDP', value: config.tmi.oauthIdp },
    { label: 'Callback Port', value: String(config.tmi.callbackPort) },
    { label: 'Token Cache', value: config.tmi.cacheDir },
    { label: 'Max Repositories', value: String(config.analysis.maxRepos) },
    { label: 'Clone Timeout', value: `${String(config.analysis.cloneTimeout / 1000)}s` },
    { label: 'Note Name', value: config.analysis.noteName },
    { label: 'Diagram Name', value: config.analysis.diagramName },
    { label: 'AI Provider', value: provider },
    { label: 'Analysis Model', value: config[provider].analysisModel },
    { label: 'Extraction Model', value: config[provider].extractionModel },
    { label: 'GitHub Token', value: configured(config.github.token) },
    { label: 'Anthropic API Key', value: configured(config.anthropic.apiKey) },
    { label: 'OpenAI API Key', value: configured(config.openai.apiKey) },
    { label: 'Gemini API Key', value: configured(config.gemini.apiKey) },
  ];
}
