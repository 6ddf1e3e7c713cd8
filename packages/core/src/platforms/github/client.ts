import { Octokit } from '@octokit/rest';
import { CONFIG } from '../../utils/config.js';
import { debugLog } from '../../utils/debug-log.js';
import { errorMessage } from '../../utils/error-utils.js';

const GITHUB_HOSTS = new Set(['github.com', 'www.github.com']);

export interface GitHubRepositoryRef {
  owner: string;
  repo: string;
}

export interface GitHubRepositoryInfo {
  fullName: string;
  /** Size in KB as reported by the API. */
  size: number;
  stars: number;
  defaultBranch: string;
  isPrivate: boolean;
}

export function isGitHubUrl(url: string): boolean {
  if (!URL.canParse(url)) return false;
  return GITHUB_HOSTS.has(new URL(url).hostname);
}

/** Owner and repository name from a GitHub URL, or null when the path is too short. */
export function parseGitHubUrl(url: string): GitHubRepositoryRef | null {
  if (!URL.canParse(url)) return null;
  const [owner, repo] = new URL(url).pathname.replace(/^\/+|\/+$/g, '').split('/');
  if (!owner || !repo) return null;
  return { owner, repo: repo.replace(/\.git$/, '') };
}

export class GitHubClient {
  private octokit: Octokit;

  constructor(token?: string) {
    const authToken = token ?? CONFIG.github.token;
    if (!authToken) {
      debugLog('github', 'No GITHUB_TOKEN set, unauthenticated rate limits apply');
    }
    this.octokit = new Octokit({
      ...(authToken ? { auth: authToken } : {}),
      request: { timeout: CONFIG.github.defaultTimeout },
    });
  }

  /** Repository metadata, or null when the URL is not parseable or the API call fails. */
  async getRepositoryInfo(url: string): Promise<GitHubRepositoryInfo | null> {
    const ref = parseGitHubUrl(url);
    if (!ref) {
      debugLog('github', 'Could not parse GitHub URL', { url });
      return null;
    }

    try {
      const { data } = await this.octokit.rest.repos.get({ owner: ref.owner, repo: ref.repo });
      const info: GitHubRepositoryInfo = {
        fullName: data.full_name,
        size: data.size,
        stars: data.stargazers_count,
        defaultBranch: data.default_branch,
        isPrivate: data.private,
      };
      debugLog('github', 'Retrieved repository info', info);
      return info;
    } catch (error) {
      debugLog('github', `Failed to get repository ${ref.owner}/${ref.repo}`, {
        error: errorMessage(error),
      });
      return null;
    }
  }

  /**
   * Whether the repository likely contains Terraform files. A failed code
   * search (rate limit, missing scope) counts as a yes so that the clone
   * step makes the final call.
   */
  async hasTerraformFiles(url: string): Promise<boolean> {
    const info = await this.getRepositoryInfo(url);
    if (!info) return false;

    try {
      const { data } = await this.octokit.rest.search.code({
        q: `extension:tf repo:${info.fullName}`,
        per_page: 1,
      });
      debugLog('github', `Terraform search for ${info.fullName}`, { total: data.total_count });
      return data.total_count > 0;
    } catch (error) {
      debugLog('github', `Terraform search failed for ${info.fullName}, will attempt clone`, {
        error: errorMessage(error),
      });
      return true;
    }
  }
}
