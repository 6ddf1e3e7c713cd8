import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { createAuthenticator } from '../auth/authenticator.js';
import type { TerraformAnalysis } from '../analysis/analysis-types.js';
import type { AIProvider } from '../providers/ai-provider.js';
import { createAIProvider } from '../providers/provider-factory.js';
import { DiagramBuilder } from '../diagram/diagram-builder.js';
import type { DiagramLogger } from '../diagram/diagram-types.js';
import { GitHubClient, isGitHubUrl } from '../platforms/github/client.js';
import { cloneRepositorySparse, extractRepositoryName } from '../repository/sparse-clone.js';
import type { Diagram, Note, ThreatModel, TmiRepository } from '../schemas/tmi-api.schema.js';
import { TmiClient } from '../tmi/tmi-client.js';
import { generateReport, writeReportToFile } from '../output/report.js';
import { TfmapError, ErrorCode } from '../errors.js';
import { CONFIG, assertProviderConfigured } from '../utils/config.js';
import { debugLog } from '../utils/debug-log.js';
import { errorMessage } from '../utils/error-utils.js';

export interface AnalyzeOptions {
  threatModelId: string;
  maxRepos?: number;
  /** Build the report but write nothing to TMI. */
  dryRun?: boolean;
  outputFile?: string;
  forceAuth?: boolean;
  skipDiagram?: boolean;
  onAuthorizationUrl?: (url: string) => void;
}

export interface DiagramOutcome {
  diagram: Diagram;
  cellCount: number;
}

export interface AnalyzeResult {
  threatModel: ThreatModel;
  report: string;
  analyses: TerraformAnalysis[];
  /** Repositories left out, with the reason. */
  skipped: { name: string; url: string; reason: string }[];
  note?: Note;
  diagram?: DiagramOutcome;
}

function repositoryLabel(repo: TmiRepository): string {
  return repo.name ?? extractRepositoryName(repo.uri);
}

function progressLogger(p: ProgressReporter): DiagramLogger {
  return {
    warn(message) {
      p.warn(message);
    },
    debug(message, data) {
      debugLog('diagram', message, data);
    },
  };
}

async function analyzeRepository(
  repo: TmiRepository,
  provider: AIProvider,
  github: GitHubClient,
  p: ProgressReporter
): Promise<TerraformAnalysis | string> {
  if (!(await github.hasTerraformFiles(repo.uri))) {
    return 'no Terraform files found on GitHub';
  }

  const name = extractRepositoryName(repo.uri);
  p.start(`Cloning ${name}`);
  const cloned = await cloneRepositorySparse(repo.uri, name);
  if (!cloned) {
    p.succeed(`Cloned ${name}: no Terraform files in checkout`);
    return 'no Terraform files in checkout';
  }

  try {
    const fileCount = Object.keys(cloned.repository.terraformFiles).length;
    p.succeed(`Cloned ${name} (${String(fileCount)} Terraform file(s))`);
    p.start(`Analyzing ${name}`);
    const analysis = await provider.analyzeRepository({
      repository: cloned.repository,
      maxDocChars: CONFIG.analysis.maxDocChars,
    });
    for (const warning of analysis.warnings ?? []) p.warn(warning);
    if (analysis.success) {
      p.succeed(`Analyzed ${name}`);
    } else {
      p.fail(`Analysis of ${name} failed`);
    }
    return analysis;
  } finally {
    await cloned.cleanup();
  }
}

async function publishDiagram(
  client: TmiClient,
  provider: AIProvider,
  threatModelId: string,
  report: string,
  p: ProgressReporter
): Promise<DiagramOutcome | undefined> {
  p.start('Extracting components and flows');
  const extracted = await provider.extractDiagramData(report);
  if (!extracted.valid) {
    p.warn(`Failed to generate structured data for diagram: ${extracted.issues.join('; ')}`);
    return undefined;
  }
  const data = extracted.data;
  p.succeed(
    `Extracted ${String(data.components.length)} component(s) and ${String(data.flows.length)} flow(s)`
  );

  const cells = new DiagramBuilder(data.components, data.flows, {
    logger: progressLogger(p),
  }).build();
  p.start(`Saving diagram "${CONFIG.analysis.diagramName}"`);
  const diagram = await client.createOrUpdateDiagram(
    threatModelId,
    CONFIG.analysis.diagramName,
    cells
  );
  p.succeed(`Diagram ${diagram.id} saved with ${String(cells.length)} cells`);
  return { diagram, cellCount: cells.length };
}

/**
 * Analyze the GitHub repositories linked to a threat model, then publish a
 * markdown note and a data flow diagram back to it.
 */
export async function runAnalyze(
  options: AnalyzeOptions,
  progress?: ProgressReporter
): Promise<AnalyzeResult> {
  const p = progress ?? new SilentProgress();
  const maxRepos = options.maxRepos ?? CONFIG.analysis.maxRepos;

  // ── Initialise clients ───────────────────────────────────────────────
  p.section('Setup');
  assertProviderConfigured();
  const provider = createAIProvider();
  p.start('Authenticating with TMI');
  const token = await createAuthenticator({
    onAuthorizationUrl: options.onAuthorizationUrl,
  }).getToken({ forceRefresh: options.forceAuth });
  p.succeed('Authenticated with TMI');
  const client = new TmiClient(CONFIG.tmi.serverUrl, token);
  const github = new GitHubClient();

  // ── Threat model and repositories ────────────────────────────────────
  p.section('Threat Model');
  p.start('Fetching threat model');
  const threatModel = await client.getThreatModel(options.threatModelId);
  p.succeed(`Threat model: ${threatModel.name}`);

  p.start('Fetching repositories');
  const repositories = await client.listRepositories(options.threatModelId);
  const githubRepos = repositories.filter((repo) => isGitHubUrl(repo.uri));
  p.succeed(
    `Found ${String(repositories.length)} repositories (${String(githubRepos.length)} on GitHub)`
  );
  if (githubRepos.length === 0) {
    throw new TfmapError(
      'No GitHub repositories found in threat model',
      ErrorCode.PLATFORM_NOT_FOUND,
      `Threat model ${options.threatModelId} has no GitHub repositories to analyze.`,
      { threatModelId: options.threatModelId }
    );
  }

  const selected = githubRepos.slice(0, maxRepos);
  if (githubRepos.length > maxRepos) {
    p.warn(
      `Limiting analysis to ${String(maxRepos)} of ${String(githubRepos.length)} repositories`
    );
  }

  // ── Per-repository analysis ──────────────────────────────────────────
  p.section(`Analyzing ${String(selected.length)} repositories`);
  const analyses: TerraformAnalysis[] = [];
  const skipped: AnalyzeResult['skipped'] = [];
  for (const repo of selected) {
    const label = repositoryLabel(repo);
    try {
      const outcome = await analyzeRepository(repo, provider, github, p);
      if (typeof outcome === 'string') {
        skipped.push({ name: label, url: repo.uri, reason: outcome });
        p.info(`Skipped ${label}: ${outcome}`);
      } else {
        analyses.push(outcome);
      }
    } catch (error) {
      skipped.push({ name: label, url: repo.uri, reason: errorMessage(error) });
      p.fail(`Failed to analyze ${label}: ${errorMessage(error)}`);
    }
  }

  if (analyses.length === 0) {
    throw new TfmapError(
      'No repositories were successfully analyzed',
      ErrorCode.ANALYSIS_NO_RESULTS,
      'None of the selected repositories could be analyzed.',
      { threatModelId: options.threatModelId, skipped: skipped.length }
    );
  }

  // ── Report ───────────────────────────────────────────────────────────
  p.section('Report');
  const providerName = CONFIG.ai.provider;
  const report = generateReport({
    threatModelName: threatModel.name,
    threatModelId: options.threatModelId,
    analyses,
    generatedAt: new Date(),
    engine: `${providerName} (${CONFIG[providerName].analysisModel})`,
    toolVersion: CONFIG.app.version,
  });
  p.succeed(`Report generated for ${String(analyses.length)} repositories`);

  if (options.outputFile) {
    writeReportToFile(report, options.outputFile);
    p.succeed(`Report saved to ${options.outputFile}`);
  }

  const result: AnalyzeResult = { threatModel, report, analyses, skipped };

  if (options.dryRun) {
    p.info('Dry run: skipped note and diagram creation');
    return result;
  }

  // ── Publish to TMI ───────────────────────────────────────────────────
  p.section('Publish');
  p.start(`Saving note "${CONFIG.analysis.noteName}"`);
  result.note = await client.createOrUpdateNote(options.threatModelId, {
    name: CONFIG.analysis.noteName,
    content: report,
    description: `Automated analysis of ${String(analyses.length)} Terraform repositories`,
  });
  p.succeed(`Note ${result.note.id} saved`);

  if (options.skipDiagram) {
    p.info('Skipping diagram generation');
    return result;
  }

  try {
    result.diagram = await publishDiagram(client, provider, options.threatModelId, report, p);
  } catch (error) {
    p.warn(`Failed to generate diagram: ${errorMessage(error)}. Continuing without diagram.`);
  }
  return result;
}
