export interface RepositoryAnalysisPromptVars {
  repository: {
    name: string;
    url: string;
  };
  terraformContents: string;
  documentationSummary: string;
}

export interface DiagramExtractionPromptVars {
  analysis: string;
}
