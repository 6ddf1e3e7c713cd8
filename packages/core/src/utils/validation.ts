import type { z } from 'zod';
import { TfmapError, ErrorCode } from '../errors.js';

/** Render zod issues as a numbered, path-qualified list. */
export function formatIssues(issues: z.ZodError['issues']): string[] {
  return issues.map((issue, idx) => {
    const path = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
    return `${String(idx + 1)}. [${path}] ${issue.message}`;
  });
}

export function validate<T>(schema: z.ZodType<T>, data: unknown, fieldName?: string): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = formatIssues(result.error.issues)
    .map((line) => `  ${line}`)
    .join('\n');

  throw new TfmapError(
    `Validation failed${fieldName ? ` for ${fieldName}` : ''}:\n${issues}`,
    ErrorCode.INPUT_INVALID,
    `Invalid data${fieldName ? ` in ${fieldName}` : ''}: ${String(result.error.issues.length)} issue(s) found`,
    { field: fieldName }
  );
}
