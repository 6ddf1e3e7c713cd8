import { writeFileSync } from 'fs';
import type { TerraformAnalysis } from '../analysis/analysis-types.js';

export const SECTION_SEPARATOR = '\n\n---\n\n';

export interface ReportInput {
  threatModelName: string;
  threatModelId: string;
  analyses: TerraformAnalysis[];
  generatedAt: Date;
  /** Shown in the footer, e.g. `anthropic (claude-sonnet-4-5)`. */
  engine?: string;
  toolVersion?: string;
}

const FOCUS_AREAS = [
  '**Authentication & Authorization**: Review access controls, IAM policies, and service-to-service authentication mechanisms',
  '**Data Protection**: Examine data at rest and in transit, encryption configurations, and data flow paths',
  '**Network Security**: Analyze network segmentation, firewall rules, security groups, and exposure to public networks',
  '**Secrets Management**: Verify proper handling of credentials, API keys, and sensitive configuration',
  '**Logging & Monitoring**: Ensure adequate logging, monitoring, and alerting for security events',
  '**Compliance & Configuration**: Check for compliance with security standards and hardened configurations',
];

const NEXT_STEPS = [
  'Review the detailed findings for each repository above',
  'Identify high-risk components and data flows',
  'Review the generated data flow diagram for critical infrastructure components',
  'Document identified threats in the threat model',
  'Prioritize remediation based on risk assessment',
];

function numbered(items: string[]): string {
  return items.map((item, i) => `${String(i + 1)}. ${item}`).join('\n');
}

/** `YYYY-MM-DD HH:MM:SS UTC` */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function header({ threatModelName, threatModelId, analyses, generatedAt }: ReportInput): string {
  const successful = analyses.filter((a) => a.success).length;
  const failed = analyses.length - successful;
  return [
    '# Terraform Infrastructure Analysis',
    '',
    `**Threat Model**: ${threatModelName}`,
    `**Threat Model ID**: \`${threatModelId}\``,
    `**Generated**: ${formatTimestamp(generatedAt)}`,
    `**Repositories Analyzed**: ${String(analyses.length)} (${String(successful)} successful, ${String(failed)} failed)`,
    '',
    'This report provides an automated analysis of the Terraform code associated with this threat model: infrastructure components, their relationships, data flows, and security considerations.',
  ].join('\n');
}

function executiveSummary(analyses: TerraformAnalysis[]): string {
  const successful = analyses.filter((a) => a.success);
  const failed = analyses.filter((a) => !a.success);
  const parts = ['## Executive Summary'];

  if (successful.length > 0) {
    parts.push(
      `Successfully analyzed ${String(successful.length)} ${successful.length === 1 ? 'repository' : 'repositories'} containing Terraform infrastructure code.`
    );
  }
  if (failed.length > 0) {
    parts.push(
      `⚠️ **Warning**: ${String(failed.length)} ${failed.length === 1 ? 'repository' : 'repositories'} failed analysis: ${failed.map((a) => a.repoName).join(', ')}`
    );
  }
  parts.push(
    'The detailed analysis for each repository follows, then consolidated findings and threat modeling focus areas.'
  );
  return parts.join('\n\n');
}

function repositorySection(analysis: TerraformAnalysis, index: number): string {
  const icon = analysis.success ? '✅' : '❌';
  return [
    `## Repository ${String(index + 1)}: ${analysis.repoName} ${icon}`,
    '',
    `**URL**: [${analysis.repoUrl}](${analysis.repoUrl})`,
    `**Status**: ${analysis.success ? 'Analysis Successful' : 'Analysis Failed'}`,
    '',
    analysis.content,
  ].join('\n');
}

function consolidatedFindings(analyses: TerraformAnalysis[]): string {
  const successful = analyses.filter((a) => a.success).length;
  if (successful === 0) {
    return '## Consolidated Findings\n\nNo successful analyses to consolidate.';
  }
  return [
    '## Consolidated Findings',
    '',
    `This section provides a high-level view across all ${String(successful)} analyzed ${successful === 1 ? 'repository' : 'repositories'}.`,
    '',
    '### Threat Modeling Recommendations',
    '',
    'Based on the analyzed infrastructure, consider focusing threat modeling efforts on:',
    '',
    numbered(FOCUS_AREAS),
    '',
    '### Next Steps',
    '',
    numbered(NEXT_STEPS),
  ].join('\n');
}

function footer({ engine, toolVersion }: ReportInput): string {
  const lines = ['**Report Generated By**: tfmap'];
  if (engine) lines.push(`**Analysis Engine**: ${engine}`);
  if (toolVersion) lines.push(`**Tool Version**: ${toolVersion}`);
  lines.push(
    '',
    '*This is an automated analysis. Review findings with your security and infrastructure teams before acting on them.*'
  );
  return lines.join('\n');
}

/** Markdown report for a threat model, one section per analyzed repository. */
export function generateReport(input: ReportInput): string {
  const sections = [
    header(input),
    executiveSummary(input.analyses),
    ...input.analyses.map(repositorySection),
    consolidatedFindings(input.analyses),
    footer(input),
  ];
  return sections.join(SECTION_SEPARATOR);
}

export function writeReportToFile(report: string, filePath: string): void {
  writeFileSync(filePath, report, 'utf-8');
}
