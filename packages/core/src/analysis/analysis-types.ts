/**
 * A sparse-cloned repository reduced to the files the analysis reads.
 * File maps are keyed by path relative to the clone root.
 */
export interface TerraformRepository {
  name: string;
  url: string;
  clonePath: string;
  terraformFiles: Record<string, string>;
  documentationFiles: Record<string, string>;
}

/** Markdown analysis of one repository. `success: false` carries the failure text as content. */
export interface TerraformAnalysis {
  repoName: string;
  repoUrl: string;
  content: string;
  success: boolean;
  /** Non-fatal notes raised while preparing the request. */
  warnings?: string[];
}

export interface RepositoryAnalysisPromptData {
  repository: TerraformRepository;
  maxDocChars: number;
}

export interface AnalysisPrompt {
  system: string;
  user: string;
}
