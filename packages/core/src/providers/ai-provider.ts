import type {
  RepositoryAnalysisPromptData,
  TerraformAnalysis,
} from '../analysis/analysis-types.js';
import type { DiagramDataResult } from '../analysis/structured-data.js';

/** Provider interface for AI-powered infrastructure analysis. */
export interface AIProvider {
  /**
   * Produce a markdown analysis of one repository's Terraform code.
   * Provider failures are reported through `success: false`, not thrown.
   */
  analyzeRepository(data: RepositoryAnalysisPromptData): Promise<TerraformAnalysis>;

  /**
   * Turn an analysis report into validated component and flow data.
   * A response without usable structure resolves to `valid: false` with the
   * reasons it was rejected.
   */
  extractDiagramData(analysisMarkdown: string): Promise<DiagramDataResult>;
}
