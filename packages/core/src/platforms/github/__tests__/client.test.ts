import { describe, it, expect, beforeEach, vi } from 'vitest';

const { mockReposGet, mockSearchCode } = vi.hoisted(() => ({
  mockReposGet: vi.fn(),
  mockSearchCode: vi.fn(),
}));

vi.mock('@octokit/rest', () => ({
  Octokit: class MockOctokit {
    rest = {
      repos: { get: mockReposGet },
      search: { code: mockSearchCode },
    };
  },
}));

vi.mock('../../../utils/config.js', () => ({
  CONFIG: {
    github: { token: 'test-token', defaultTimeout: 30000 },
    debug: { verbose: false },
  },
}));

import { GitHubClient, isGitHubUrl, parseGitHubUrl } from '../client.js';

function makeRepoResponse() {
  return {
    data: {
      full_name: 'acme/infra',
      size: 2048,
      stargazers_count: 7,
      default_branch: 'main',
      private: false,
    },
  };
}

describe('isGitHubUrl', () => {
  it('should accept github.com hosts', () => {
    expect(isGitHubUrl('https://github.com/acme/infra')).toBe(true);
    expect(isGitHubUrl('https://www.github.com/acme/infra')).toBe(true);
  });

  it('should reject other hosts and non-URLs', () => {
    expect(isGitHubUrl('https://gitlab.com/acme/infra')).toBe(false);
    expect(isGitHubUrl('not a url')).toBe(false);
  });
});

describe('parseGitHubUrl', () => {
  it('should strip a .git suffix', () => {
    expect(parseGitHubUrl('https://github.com/acme/infra.git')).toEqual({
      owner: 'acme',
      repo: 'infra',
    });
  });

  it('should ignore trailing path segments', () => {
    expect(parseGitHubUrl('https://github.com/acme/infra/tree/main/')).toEqual({
      owner: 'acme',
      repo: 'infra',
    });
  });

  it('should return null without a repository segment', () => {
    expect(parseGitHubUrl('https://github.com/acme')).toBeNull();
  });
});

describe('GitHubClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should map repository metadata', async () => {
    mockReposGet.mockResolvedValueOnce(makeRepoResponse());
    const client = new GitHubClient();

    await expect(client.getRepositoryInfo('https://github.com/acme/infra')).resolves.toEqual({
      fullName: 'acme/infra',
      size: 2048,
      stars: 7,
      defaultBranch: 'main',
      isPrivate: false,
    });
    expect(mockReposGet).toHaveBeenCalledWith({ owner: 'acme', repo: 'infra' });
  });

  it('should return null when the repository lookup fails', async () => {
    mockReposGet.mockRejectedValueOnce(Object.assign(new Error('Not Found'), { status: 404 }));
    const client = new GitHubClient();

    await expect(client.getRepositoryInfo('https://github.com/acme/gone')).resolves.toBeNull();
  });

  it('should report Terraform files from code search', async () => {
    mockReposGet.mockResolvedValueOnce(makeRepoResponse());
    mockSearchCode.mockResolvedValueOnce({ data: { total_count: 0 } });
    const client = new GitHubClient();

    await expect(client.hasTerraformFiles('https://github.com/acme/infra')).resolves.toBe(false);
    expect(mockSearchCode).toHaveBeenCalledWith({
      q: 'extension:tf repo:acme/infra',
      per_page: 1,
    });
  });

  it('should assume Terraform files when search fails', async () => {
    mockReposGet.mockResolvedValueOnce(makeRepoResponse());
    mockSearchCode.mockRejectedValueOnce(new Error('rate limited'));
    const client = new GitHubClient();

    await expect(client.hasTerraformFiles('https://github.com/acme/infra')).resolves.toBe(true);
  });

  it('should not search when the repository is unavailable', async () => {
    mockReposGet.mockRejectedValueOnce(new Error('Not Found'));
    const client = new GitHubClient();

    await expect(client.hasTerraformFiles('https://github.com/acme/gone')).resolves.toBe(false);
    expect(mockSearchCode).not.toHaveBeenCalled();
  });
});
