import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider, type ModelCallOptions } from '../base-provider.js';
import { ApiError, TfmapError, ErrorCode } from '../../errors.js';
import type { AnalysisPhase } from '../analysis-phase.js';
import { ANTHROPIC_MODELS } from './models.js';
import { debugLog } from '../../utils/debug-log.js';

export class AnthropicProvider extends BaseProvider {
  private readonly client: Anthropic;

  constructor(config: {
    apiKey: string;
    analysisModel?: string;
    extractionModel?: string;
    timeout?: number;
  }) {
    if (!config.apiKey) {
      throw new TfmapError(
        'An Anthropic API key is needed',
        ErrorCode.AUTH_KEY_MISSING,
        'No Anthropic API key found. Set ANTHROPIC_API_KEY in your environment.'
      );
    }
    super({
      analysisModel: config.analysisModel ?? ANTHROPIC_MODELS.ANALYSIS,
      extractionModel: config.extractionModel ?? ANTHROPIC_MODELS.EXTRACTION,
    });
    this.client = new Anthropic({ apiKey: config.apiKey, timeout: config.timeout });
  }

  protected async callModel(
    model: string,
    prompt: string,
    phase: AnalysisPhase,
    maxTokens: number,
    options: ModelCallOptions = {}
  ): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model,
        max_tokens: maxTokens,
        system: options.system,
        temperature: options.temperature,
        messages: [{ role: 'user', content: prompt }],
      });

      if (response.stop_reason === 'refusal') {
        throw new TfmapError(
          'Anthropic safety filters blocked the response',
          ErrorCode.PROVIDER_SAFETY_BLOCK,
          'Content was blocked by the AI provider safety filters. Try simplifying the input.',
          { model, phase }
        );
      }

      const textBlock = response.content.find((b) => b.type === 'text');
      const text = textBlock && 'text' in textBlock ? textBlock.text : undefined;

      if (!text) {
        throw new TfmapError(
          'Anthropic returned an empty response',
          ErrorCode.PROVIDER_INVALID_RESPONSE,
          'The Anthropic API returned no content',
          { model, phase }
        );
      }

      if (response.stop_reason === 'max_tokens') {
        throw new TfmapError(
          'Anthropic response was cut short (max_tokens reached)',
          ErrorCode.PROVIDER_INVALID_RESPONSE,
          'The AI response was truncated. The output may be partial.',
          { model, phase, maxTokens }
        );
      }

      debugLog('AI', `${phase} usage`, {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      });
      return text;
    } catch (error) {
      if (error instanceof TfmapError) {
        throw error;
      }
      throw ApiError.fromAnthropicError(error);
    }
  }
}
