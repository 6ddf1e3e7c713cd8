import { describe, it, expect } from 'vitest';
import { TemplateEngine, replaceVariables } from '../template-engine.js';

describe('TemplateEngine', () => {
  describe('replaceVariables', () => {
    it('should resolve nested paths', () => {
      expect(replaceVariables('Repo {{ repository.name }}', { repository: { name: 'infra' } })).toBe(
        'Repo infra'
      );
    });

    it('should drop unknown variables', () => {
      expect(replaceVariables('a{{missing}}b', {})).toBe('ab');
    });

    it('should join arrays and stringify objects', () => {
      expect(replaceVariables('{{list}} {{obj}}', { list: ['x', 'y'], obj: { k: 1 } })).toBe(
        'x, y {"k":1}'
      );
    });
  });

  it('should fill the repository analysis template', () => {
    const prompt = TemplateEngine.loadRepositoryAnalysisPrompt({
      repository: { name: 'acme_infra', url: 'https://github.com/acme/infra' },
      terraformContents: 'TF-CONTENTS',
      documentationSummary: 'DOCS',
    });
    expect(prompt).toContain('Repository: acme_infra\nURL: https://github.com/acme/infra');
    expect(prompt).toContain('Terraform Files:\nTF-CONTENTS');
    expect(prompt).not.toContain('{{');
  });

  it('should append the analysis to the extraction template', () => {
    const prompt = TemplateEngine.loadDiagramExtractionPrompt({ analysis: '## Data Flows' });
    expect(prompt.trimEnd().endsWith('# Infrastructure Analysis\n\n## Data Flows')).toBe(true);
  });
});
