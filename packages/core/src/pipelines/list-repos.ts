import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { createAuthenticator } from '../auth/authenticator.js';
import { isGitHubUrl } from '../platforms/github/client.js';
import type { ThreatModel } from '../schemas/tmi-api.schema.js';
import { TmiClient } from '../tmi/tmi-client.js';
import { CONFIG } from '../utils/config.js';

export interface ListedRepository {
  name: string;
  url: string;
  type: string;
  isGitHub: boolean;
}

export interface ListReposResult {
  threatModel: ThreatModel;
  repositories: ListedRepository[];
}

export interface ListReposOptions {
  threatModelId: string;
  onAuthorizationUrl?: (url: string) => void;
}

export async function runListRepos(
  options: ListReposOptions,
  progress?: ProgressReporter
): Promise<ListReposResult> {
  const p = progress ?? new SilentProgress();

  p.start('Authenticating with TMI');
  const token = await createAuthenticator({
    onAuthorizationUrl: options.onAuthorizationUrl,
  }).getToken();
  p.succeed('Authenticated with TMI');

  const client = new TmiClient(CONFIG.tmi.serverUrl, token);
  p.start('Fetching repositories');
  const threatModel = await client.getThreatModel(options.threatModelId);
  const repositories = await client.listRepositories(options.threatModelId);
  p.succeed(`Found ${String(repositories.length)} repositories`);

  return {
    threatModel,
    repositories: repositories.map((repo) => ({
      name: repo.name ?? repo.uri,
      url: repo.uri,
      type: repo.type ?? 'unknown',
      isGitHub: isGitHubUrl(repo.uri),
    })),
  };
}
