import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { BaseProvider, type ModelCallOptions } from '../base-provider.js';
import { TfmapError, ErrorCode, ApiError } from '../../errors.js';
import type { AnalysisPhase } from '../analysis-phase.js';
import { OPENAI_MODELS } from './models.js';

export class OpenAIProvider extends BaseProvider {
  private readonly client: OpenAI;

  constructor(config: {
    apiKey: string;
    analysisModel?: string;
    extractionModel?: string;
    timeout?: number;
  }) {
    if (!config.apiKey) {
      throw new TfmapError(
        'An OpenAI API key is needed',
        ErrorCode.AUTH_KEY_MISSING,
        'No OpenAI API key found. Set OPENAI_API_KEY in your environment.'
      );
    }
    super({
      analysisModel: config.analysisModel ?? OPENAI_MODELS.ANALYSIS,
      extractionModel: config.extractionModel ?? OPENAI_MODELS.EXTRACTION,
    });
    this.client = new OpenAI({ apiKey: config.apiKey, timeout: config.timeout });
  }

  protected async callModel(
    model: string,
    prompt: string,
    phase: AnalysisPhase,
    maxTokens: number,
    options: ModelCallOptions = {}
  ): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    try {
      const response = await this.client.chat.completions.create({
        model,
        max_tokens: maxTokens,
        temperature: options.temperature,
        messages,
      });

      const choice = response.choices[0];
      if (!choice) {
        throw new TfmapError(
          'OpenAI returned an empty response',
          ErrorCode.PROVIDER_INVALID_RESPONSE,
          'The OpenAI API returned no content',
          { model, phase }
        );
      }

      if (choice.finish_reason === 'content_filter') {
        throw new TfmapError(
          'OpenAI safety filters blocked the response',
          ErrorCode.PROVIDER_SAFETY_BLOCK,
          'Content was blocked by the AI provider safety filters. Try simplifying the input.',
          { model, phase }
        );
      }

      const text = choice.message.content;
      if (!text) {
        throw new TfmapError(
          'OpenAI returned an empty response',
          ErrorCode.PROVIDER_INVALID_RESPONSE,
          'The OpenAI API returned no content',
          { model, phase }
        );
      }

      if (choice.finish_reason === 'length') {
        throw new TfmapError(
          'OpenAI response was cut short (max_tokens reached)',
          ErrorCode.PROVIDER_INVALID_RESPONSE,
          'The AI response was truncated. The output may be partial.',
          { model, phase, maxTokens }
        );
      }

      return text;
    } catch (error) {
      if (error instanceof TfmapError) {
        throw error;
      }
      throw ApiError.fromOpenAIError(error);
    }
  }
}
