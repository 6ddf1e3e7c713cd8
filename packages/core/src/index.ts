// Diagram
export { DiagramBuilder, buildDiagramFromText, defaultDiagramLogger } from './diagram/diagram-builder.js';
export type { BuildFromTextResult } from './diagram/diagram-builder.js';
export { isEdgeCell, isNodeCell } from './diagram/diagram-types.js';
export type {
  DiagramCell,
  NodeCell,
  EdgeCell,
  DiagramLogger,
  DiagramBuildOptions,
} from './diagram/diagram-types.js';

// Structured data
export { parseDiagramData, validateDiagramData, extractJsonValue } from './analysis/structured-data.js';
export type { DiagramDataResult } from './analysis/structured-data.js';
export { DiagramDataSchema } from './schemas/diagram-data.schema.js';
export type { Component, ComponentType, Flow, DiagramData } from './schemas/diagram-data.schema.js';

// Analysis
export type { TerraformRepository, TerraformAnalysis } from './analysis/analysis-types.js';

// Providers
export { createAIProvider } from './providers/provider-factory.js';
export type { AIProvider } from './providers/ai-provider.js';

// GitHub and repositories
export { GitHubClient, isGitHubUrl, parseGitHubUrl } from './platforms/github/client.js';
export {
  cloneRepositorySparse,
  extractRepositoryName,
  classifyRepositoryFiles,
} from './repository/sparse-clone.js';
export type { ClonedRepository } from './repository/sparse-clone.js';

// TMI
export { TmiClient } from './tmi/tmi-client.js';
export { TmiAuthenticator, createAuthenticator } from './auth/authenticator.js';
export { TokenCache } from './auth/token-cache.js';
export type { ThreatModel, TmiRepository, Note, Diagram } from './schemas/tmi-api.schema.js';

// Report
export { generateReport, writeReportToFile, formatTimestamp } from './output/report.js';
export type { ReportInput } from './output/report.js';

// Config
export { CONFIG, createConfig, assertProviderConfigured } from './utils/config.js';
export type { Config } from './utils/config.js';

// Errors
export {
  TfmapError,
  ConfigurationError,
  ApiError,
  DiagramBuildError,
  ErrorCode,
} from './errors.js';
export { errorMessage } from './utils/error-utils.js';
export { validate } from './utils/validation.js';

// Pipelines (headless orchestration functions)
export { runAnalyze } from './pipelines/analyze.js';
export type { AnalyzeOptions, AnalyzeResult, DiagramOutcome } from './pipelines/analyze.js';
export { runListRepos } from './pipelines/list-repos.js';
export type { ListReposOptions, ListReposResult, ListedRepository } from './pipelines/list-repos.js';
export { runAuth, clearAuth } from './pipelines/auth.js';
export type { AuthOptions } from './pipelines/auth.js';
export { describeConfig } from './pipelines/config-info.js';
export type { ConfigEntry } from './pipelines/config-info.js';
export type { ProgressReporter } from './pipelines/progress.js';
export { SilentProgress } from './pipelines/progress.js';
