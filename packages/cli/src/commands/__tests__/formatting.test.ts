import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { formatRepositories } from '../list-repos.js';
import { formatConfigEntries } from '../config-info.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatRepositories', () => {
  it('renders a table and a GitHub count', () => {
    const text = formatRepositories({
      threatModel: { id: 'tm-1', name: 'Payments' },
      repositories: [
        { name: 'infra', url: 'https://github.com/acme/infra', type: 'git', isGitHub: true },
        { name: 'legacy', url: 'https://git.example.com/legacy', type: 'unknown', isGitHub: false },
      ],
    });
    const lines = text.split('\n');
    expect(lines[0]).toBe('Threat model: Payments');
    expect(lines[2]).toBe('Name   | Type    | GitHub | URL                           ');
    expect(lines[4]).toBe('infra  | git     | yes    | https://github.com/acme/infra ');
    expect(lines[5]).toBe('legacy | unknown | no     | https://git.example.com/legacy');
    expect(lines.at(-1)).toBe('2 repositories, 1 on GitHub');
  });
});

describe('formatConfigEntries', () => {
  it('aligns values after the longest label', () => {
    expect(
      formatConfigEntries([
        { label: 'AI Provider', value: 'anthropic' },
        { label: 'Note Name', value: 'Terraform Analysis Report' },
      ])
    ).toBe('AI Provider: anthropic\nNote Name:   Terraform Analysis Report');
  });
});
