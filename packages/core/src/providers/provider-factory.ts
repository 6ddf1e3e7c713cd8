import type { AIProvider } from './ai-provider.js';
import { GeminiProvider } from './gemini/provider.js';
import { AnthropicProvider } from './anthropic/provider.js';
import { OpenAIProvider } from './openai/provider.js';
import { CONFIG } from '../utils/config.js';
import { TfmapError, ErrorCode } from '../errors.js';

function missingKey(label: string, envVar: string): TfmapError {
  return new TfmapError(
    `${label} API key is needed`,
    ErrorCode.AUTH_KEY_MISSING,
    `No ${label} API key found. Set ${envVar} in your environment or .env file.`
  );
}

export function createAIProvider(): AIProvider {
  const provider = CONFIG.ai.provider;

  switch (provider) {
    case 'gemini': {
      const { apiKey, analysisModel, extractionModel, timeout } = CONFIG.gemini;
      if (!apiKey) throw missingKey('Gemini', 'GEMINI_API_KEY');
      return new GeminiProvider({ apiKey, analysisModel, extractionModel, timeout });
    }
    case 'openai': {
      const { apiKey, analysisModel, extractionModel, timeout } = CONFIG.openai;
      if (!apiKey) throw missingKey('OpenAI', 'OPENAI_API_KEY');
      return new OpenAIProvider({ apiKey, analysisModel, extractionModel, timeout });
    }
    case 'anthropic': {
      const { apiKey, analysisModel, extractionModel, timeout } = CONFIG.anthropic;
      if (!apiKey) throw missingKey('Anthropic', 'ANTHROPIC_API_KEY');
      return new AnthropicProvider({ apiKey, analysisModel, extractionModel, timeout });
    }
    default: {
      const _exhaustive: never = provider;
      throw new TfmapError(
        `Unsupported AI provider: ${String(_exhaustive)}`,
        ErrorCode.CONFIG_INVALID,
        `Unsupported AI provider. Supported providers: gemini, anthropic, openai.`
      );
    }
  }
}
