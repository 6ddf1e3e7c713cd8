import type { AIProvider } from './ai-provider.js';
import type {
  RepositoryAnalysisPromptData,
  TerraformAnalysis,
} from '../analysis/analysis-types.js';
import { PromptBuilder, TOKEN_WARNING_THRESHOLD } from '../analysis/prompt-builder.js';
import { parseDiagramData } from '../analysis/structured-data.js';
import type { DiagramDataResult } from '../analysis/structured-data.js';
import { ApiError } from '../errors.js';
import { describeRetry, withRetry } from '../utils/retry.js';
import type { RetryPolicy } from '../utils/retry.js';
import { debugLog } from '../utils/debug-log.js';
import { errorMessage } from '../utils/error-utils.js';
import { AnalysisPhase } from './analysis-phase.js';

export interface ModelCallOptions {
  system?: string;
  temperature?: number;
}

const ANALYSIS_MAX_TOKENS = 16000;
const EXTRACTION_MAX_TOKENS = 16000;

/**
 * Abstract base class for AI providers.
 *
 * Subclasses only need to implement `callModel` with the provider-specific SDK call.
 * All shared pipeline logic (prompt building, retry, JSON extraction, validation) lives here.
 */
export abstract class BaseProvider implements AIProvider {
  protected readonly analysisModel: string;
  protected readonly extractionModel: string;

  constructor(config: { analysisModel: string; extractionModel: string }) {
    this.analysisModel = config.analysisModel;
    this.extractionModel = config.extractionModel;
  }

  /**
   * Make a single AI model call using the provider-specific SDK.
   * @param model - The model identifier to use
   * @param prompt - The user prompt text
   * @param phase - The analysis phase (for error context)
   * @param maxTokens - Maximum tokens for the response (some providers may ignore this)
   * @returns The text content of the model response
   */
  protected abstract callModel(
    model: string,
    prompt: string,
    phase: AnalysisPhase,
    maxTokens: number,
    options?: ModelCallOptions
  ): Promise<string>;

  async analyzeRepository(data: RepositoryAnalysisPromptData): Promise<TerraformAnalysis> {
    const { repository } = data;
    const prompt = PromptBuilder.buildRepositoryAnalysisPrompt(data);
    const estimatedTokens = PromptBuilder.estimateTokens(prompt.system + prompt.user);
    debugLog('AI', `analyzeRepository ${repository.name} using model`, {
      model: this.analysisModel,
      estimatedTokens,
    });

    const warnings: string[] = [];
    if (estimatedTokens > TOKEN_WARNING_THRESHOLD) {
      warnings.push(
        `Input for ${repository.name} may be too large (~${String(estimatedTokens)} tokens). Consider reducing the file count.`
      );
    }

    try {
      const content = await withRetry(
        () =>
          this.callModel(
            this.analysisModel,
            prompt.user,
            AnalysisPhase.REPOSITORY_ANALYSIS,
            ANALYSIS_MAX_TOKENS,
            { system: prompt.system }
          ),
        this.retryPolicy(AnalysisPhase.REPOSITORY_ANALYSIS)
      );
      return { repoName: repository.name, repoUrl: repository.url, content, success: true, warnings };
    } catch (error) {
      debugLog('AI', `analyzeRepository ${repository.name} failed`, errorMessage(error));
      return {
        repoName: repository.name,
        repoUrl: repository.url,
        content: `**Analysis Failed**: ${errorMessage(error)}`,
        success: false,
        warnings,
      };
    }
  }

  async extractDiagramData(analysisMarkdown: string): Promise<DiagramDataResult> {
    const prompt = PromptBuilder.buildDiagramExtractionPrompt(analysisMarkdown);
    debugLog('AI', 'extractDiagramData using model', this.extractionModel);

    const responseText = await withRetry(
      () =>
        this.callModel(
          this.extractionModel,
          prompt,
          AnalysisPhase.DIAGRAM_EXTRACTION,
          EXTRACTION_MAX_TOKENS,
          { temperature: 0 }
        ),
      this.retryPolicy(AnalysisPhase.DIAGRAM_EXTRACTION)
    );

    const result = parseDiagramData(responseText);
    if (!result.valid) {
      debugLog('AI', 'extractDiagramData rejected response (first 500 chars)', {
        issues: result.issues,
        response: responseText.slice(0, 500),
      });
    }
    return result;
  }

  /** Rate limits and timeouts are retried twice; anything else fails at once. */
  private retryPolicy(phase: AnalysisPhase): Partial<RetryPolicy> {
    const retries = 2;
    return {
      retries,
      shouldRetry: (error) => error instanceof ApiError && (error.isRateLimited || error.isTimeout),
      onRetry: (attempt, delay, error) => {
        debugLog('AI', `${phase}: ${describeRetry(attempt, retries, delay, error)}`);
      },
    };
  }
}
