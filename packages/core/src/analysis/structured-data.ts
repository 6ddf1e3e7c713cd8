import { DiagramDataSchema, type DiagramData } from '../schemas/diagram-data.schema.js';
import { debugLog } from '../utils/debug-log.js';

export type DiagramDataResult =
  | { valid: true; data: DiagramData }
  | { valid: false; issues: string[] };

const FENCED_BLOCK = /```(?:json)?[^\S\n]*\n([\s\S]*?)\n?```/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type Parsed = { found: true; value: unknown } | { found: false };

const NOT_FOUND: Parsed = { found: false };

function tryParse(text: string): Parsed {
  const trimmed = text.trim();
  if (!trimmed) return NOT_FOUND;
  try {
    const value: unknown = JSON.parse(trimmed);
    return { found: true, value };
  } catch {
    return NOT_FOUND;
  }
}

/** End index (inclusive) of the balanced object opening at `start`, ignoring braces in strings. */
function balancedObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escape = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (ch === '\\' && inString) {
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Pulls the first JSON value out of free-form model output.
 *
 * Tried in order: the whole text, each fenced code block, the widest
 * `{ … }` span, then every balanced object scanning left to right. The first
 * candidate that parses wins, whatever its shape; `undefined` when none does.
 */
export function extractJsonValue(text: string): unknown {
  const whole = tryParse(text);
  if (whole.found) return whole.value;

  for (const match of text.matchAll(FENCED_BLOCK)) {
    const block = tryParse(match[1] ?? '');
    if (block.found) return block.value;
  }

  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first === -1 || last <= first) return undefined;

  const span = tryParse(text.slice(first, last + 1));
  if (span.found) return span.value;

  for (let start = first; start !== -1; start = text.indexOf('{', start + 1)) {
    const end = balancedObjectEnd(text, start);
    if (end === -1) continue;
    const candidate = tryParse(text.slice(start, end + 1));
    if (candidate.found) return candidate.value;
  }
  return undefined;
}

/** Validates the component/flow payload without throwing. */
export function validateDiagramData(value: unknown): DiagramDataResult {
  if (!isRecord(value)) {
    debugLog('diagram', 'Structured data rejected', { type: Array.isArray(value) ? 'array' : typeof value });
    return { valid: false, issues: ['top-level value is not an object'] };
  }
  const result = DiagramDataSchema.safeParse(value);
  if (result.success) {
    debugLog('diagram', 'Structured data validated', {
      components: result.data.components.length,
      flows: result.data.flows.length,
    });
    return { valid: true, data: result.data };
  }
  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  debugLog('diagram', 'Structured data rejected', { issues });
  return { valid: false, issues };
}

export function parseDiagramData(text: string): DiagramDataResult {
  const extracted = extractJsonValue(text);
  if (extracted === undefined) {
    debugLog('diagram', 'No JSON object found in response', { length: text.length });
    return { valid: false, issues: ['no JSON object found'] };
  }
  return validateDiagramData(extracted);
}
