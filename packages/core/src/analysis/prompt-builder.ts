import type { AnalysisPrompt, RepositoryAnalysisPromptData } from './analysis-types.js';
import { TemplateEngine } from './template-engine.js';
import { formatDocumentationSummary, formatTerraformContents } from './section-formatters.js';

/** Rough size check before a call; about four characters per token. */
export const TOKEN_WARNING_THRESHOLD = 150_000;

export const PromptBuilder = {
  estimateTokens(text: string): number {
    return Math.floor(text.length / 4);
  },
  /**
   * Stage 1: system and user prompt for the per-repository infrastructure analysis
   */
  buildRepositoryAnalysisPrompt(data: RepositoryAnalysisPromptData): AnalysisPrompt {
    const { repository, maxDocChars } = data;
    return {
      system: TemplateEngine.loadAnalysisSystemPrompt(),
      user: TemplateEngine.loadRepositoryAnalysisPrompt({
        repository: { name: repository.name, url: repository.url },
        terraformContents: formatTerraformContents(repository.terraformFiles),
        documentationSummary: formatDocumentationSummary(repository.documentationFiles, maxDocChars),
      }),
    };
  },
  /**
   * Stage 2: turn the combined analysis report into component/flow JSON
   */
  buildDiagramExtractionPrompt(analysisMarkdown: string): string {
    return TemplateEngine.loadDiagramExtractionPrompt({ analysis: analysisMarkdown });
  },
};
