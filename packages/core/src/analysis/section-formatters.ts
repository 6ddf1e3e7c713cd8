function sortedEntries(files: Record<string, string>): [string, string][] {
  return Object.entries(files).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function formatTerraformContents(files: Record<string, string>): string {
  const entries = sortedEntries(files);
  if (entries.length === 0) {
    return '(No Terraform files found)';
  }
  return entries
    .map(([path, content]) => `### File: ${path}\n\`\`\`hcl\n${content}\n\`\`\`\n`)
    .join('\n');
}

/** Documentation excerpts, each cut to `maxChars` with a trailing ellipsis. */
export function formatDocumentationSummary(docs: Record<string, string>, maxChars: number): string {
  const entries = sortedEntries(docs);
  if (entries.length === 0) {
    return '';
  }
  const sections = entries.map(([path, content]) => {
    const excerpt = content.length > maxChars ? `${content.slice(0, maxChars)}...` : content;
    return `### ${path}\n${excerpt}\n`;
  });
  return ['Documentation Files:', ...sections].join('\n');
}
