import { readFileSync } from 'fs';
import type { DiagramExtractionPromptVars, RepositoryAnalysisPromptVars } from './prompt-variables.js';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function loadTemplate(templateName: string): string {
  const templatePath = join(__dirname, 'prompts', `${templateName}.md`);
  return readFileSync(templatePath, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function resolveVariable(variables: object, path: string): unknown {
  return path
    .trim()
    .split('.')
    .reduce<unknown>((obj, key) => (isRecord(obj) && key in obj ? obj[key] : undefined), variables);
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) return value.map(String).join(', ');
  if (typeof value === 'object') return JSON.stringify(value);
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

export function replaceVariables(template: string, variables: object): string {
  return template.replace(/\{\{([^}]+)\}\}/g, (_match: string, path: string) => {
    const value = resolveVariable(variables, path);
    return value === undefined ? '' : formatValue(value);
  });
}

/**
 * Simple template engine for replacing {{variable}} placeholders in markdown templates
 */
export const TemplateEngine = {
  loadAnalysisSystemPrompt(): string {
    return loadTemplate('terraform-analysis-system');
  },
  loadRepositoryAnalysisPrompt(variables: RepositoryAnalysisPromptVars): string {
    const template = loadTemplate('terraform-analysis');
    return replaceVariables(template, variables);
  },
  loadDiagramExtractionPrompt(variables: DiagramExtractionPromptVars): string {
    const template = loadTemplate('diagram-extraction');
    return replaceVariables(template, variables);
  },
} as const;
