/**
 * Analysis phases where AI models are used
 */
export enum AnalysisPhase {
  REPOSITORY_ANALYSIS = 'repository-analysis',
  DIAGRAM_EXTRACTION = 'diagram-extraction',
}
