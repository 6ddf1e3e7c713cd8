import { FinishReason, GoogleGenAI } from '@google/genai';
import { BaseProvider, type ModelCallOptions } from '../base-provider.js';
import { ApiError, TfmapError, ErrorCode } from '../../errors.js';
import type { AnalysisPhase } from '../analysis-phase.js';
import { GEMINI_MODELS } from './models.js';

export class GeminiProvider extends BaseProvider {
  private readonly client: GoogleGenAI;

  constructor(config: {
    apiKey: string;
    analysisModel?: string;
    extractionModel?: string;
    timeout?: number;
  }) {
    if (!config.apiKey) {
      throw new TfmapError(
        'A Gemini API key is needed',
        ErrorCode.AUTH_KEY_MISSING,
        'No Gemini API key found. Set GEMINI_API_KEY in your environment.'
      );
    }
    super({
      analysisModel: config.analysisModel ?? GEMINI_MODELS.ANALYSIS,
      extractionModel: config.extractionModel ?? GEMINI_MODELS.EXTRACTION,
    });
    this.client = new GoogleGenAI({
      apiKey: config.apiKey,
      httpOptions: config.timeout ? { timeout: config.timeout } : undefined,
    });
  }

  protected async callModel(
    model: string,
    prompt: string,
    phase: AnalysisPhase,
    maxTokens: number,
    options: ModelCallOptions = {}
  ): Promise<string> {
    try {
      const response = await this.client.models.generateContent({
        model,
        contents: prompt,
        config: {
          systemInstruction: options.system,
          temperature: options.temperature,
          maxOutputTokens: maxTokens,
        },
      });

      const candidate = response.candidates?.[0];
      if (candidate?.finishReason === FinishReason.SAFETY) {
        throw new TfmapError(
          'Gemini safety filters blocked the response',
          ErrorCode.PROVIDER_SAFETY_BLOCK,
          'Content was blocked by the AI provider safety filters. Try simplifying the input.',
          { model, phase }
        );
      }

      const text = response.text;
      if (!text) {
        throw new TfmapError(
          'Gemini returned an empty response',
          ErrorCode.PROVIDER_INVALID_RESPONSE,
          'The Gemini API returned no content',
          { model, phase }
        );
      }

      if (candidate?.finishReason === FinishReason.MAX_TOKENS) {
        throw new TfmapError(
          'Gemini response was cut short (max output tokens reached)',
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
      throw ApiError.fromGeminiError(error);
    }
  }
}
