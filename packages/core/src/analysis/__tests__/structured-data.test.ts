import { describe, it, expect } from 'vitest';
import { extractJsonValue, parseDiagramData, validateDiagramData } from '../structured-data.js';

const payload = {
  components: [
    { id: 'vpc', name: 'Main VPC', type: 'network' },
    { id: 'api', name: 'API', type: 'compute', parent_id: 'vpc', region: 'eu-west-1' },
    { id: 'db', name: 'Database', type: 'storage', parent_id: 'vpc' },
  ],
  flows: [{ id: 'f1', source_id: 'api', target_id: 'db', name: 'query', protocol: 'tcp', port: 5432 }],
};

describe('extractJsonValue', () => {
  it('should parse a response that is entirely JSON', () => {
    expect(extractJsonValue(JSON.stringify(payload))).toEqual(payload);
  });

  it('should read a json fenced block', () => {
    const text = 'Here is the data:\n```json\n{"components": [], "flows": []}\n```\nDone.';
    expect(extractJsonValue(text)).toEqual({ components: [], flows: [] });
  });

  it('should read a bare fenced block', () => {
    const text = 'Output\n```\n{"ok": true}\n```';
    expect(extractJsonValue(text)).toEqual({ ok: true });
  });

  it('should fall back to the widest brace span', () => {
    expect(extractJsonValue('Result: {"a": {"b": 1}} as requested')).toEqual({ a: { b: 1 } });
  });

  it('should scan for a balanced object when the widest span does not parse', () => {
    expect(extractJsonValue('set {x} then {"b": 2}')).toEqual({ b: 2 });
  });

  it('should ignore braces inside strings while scanning', () => {
    expect(extractJsonValue('{"s": "}"} trailing }')).toEqual({ s: '}' });
  });

  it('should return a top-level array as parsed instead of scanning inside it', () => {
    expect(extractJsonValue('[{"a": 1}]')).toEqual([{ a: 1 }]);
  });

  it('should return undefined when nothing parses', () => {
    expect(extractJsonValue('The repository contains no infrastructure.')).toBeUndefined();
  });
});

describe('validateDiagramData', () => {
  it('should accept a consistent payload and keep unknown keys', () => {
    const result = validateDiagramData(payload);
    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.data.components[1]).toMatchObject({ id: 'api', region: 'eu-west-1' });
      expect(result.data.flows[0]?.port).toBe(5432);
    }
  });

  it('should reject a non-object at the root', () => {
    expect(validateDiagramData(['components'])).toEqual({
      valid: false,
      issues: ['top-level value is not an object'],
    });
  });

  it('should reject a payload without flows', () => {
    const result = validateDiagramData({ components: [] });
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues.some((issue) => issue.startsWith('flows: '))).toBe(true);
    }
  });

  it('should reject an unknown component type with its record path', () => {
    const result = validateDiagramData({
      components: [{ id: 'x', name: 'X', type: 'database' }],
      flows: [],
    });
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues.some((issue) => issue.startsWith('components.0.type: '))).toBe(true);
    }
  });

  it('should reject a component missing its name', () => {
    const result = validateDiagramData({ components: [{ id: 'x', type: 'compute' }], flows: [] });
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues.some((issue) => issue.startsWith('components.0.name: '))).toBe(true);
    }
  });

  it('should reject flows that reference unknown components', () => {
    const result = validateDiagramData({
      components: [{ id: 'api', name: 'API', type: 'compute' }],
      flows: [{ id: 'f1', source_id: 'ghost', target_id: 'api' }],
    });
    expect(result).toEqual({
      valid: false,
      issues: ['flows.0.source_id: references non-existent source: ghost'],
    });
  });

  it('should reject a repeated component id', () => {
    const result = validateDiagramData({
      components: [
        { id: 'api', name: 'API', type: 'compute' },
        { id: 'db', name: 'DB', type: 'storage' },
        { id: 'api', name: 'API copy', type: 'compute' },
      ],
      flows: [{ id: 'f1', source_id: 'api', target_id: 'db' }],
    });
    expect(result).toEqual({
      valid: false,
      issues: ['components.2.id: duplicate component id: api'],
    });
  });

  it('should reject a dangling parent id', () => {
    const result = validateDiagramData({
      components: [
        { id: 'api', name: 'API', type: 'compute' },
        { id: 'db', name: 'DB', type: 'storage', parent_id: 'nowhere' },
      ],
      flows: [],
    });
    expect(result).toEqual({
      valid: false,
      issues: ['components.1.parent_id: references non-existent parent: nowhere'],
    });
  });
});

describe('parseDiagramData', () => {
  it('should extract and validate in one step', () => {
    const result = parseDiagramData(`Analysis complete.\n\`\`\`json\n${JSON.stringify(payload)}\n\`\`\``);
    expect(result.valid).toBe(true);
  });

  it('should reject a response whose JSON is an array of payloads', () => {
    const text = JSON.stringify([
      { components: [{ id: 'a', name: 'A', type: 'compute' }], flows: [] },
    ]);
    expect(parseDiagramData(text)).toEqual({
      valid: false,
      issues: ['top-level value is not an object'],
    });
  });

  it('should report missing JSON as an issue', () => {
    expect(parseDiagramData('no data here')).toEqual({
      valid: false,
      issues: ['no JSON object found'],
    });
  });
});
