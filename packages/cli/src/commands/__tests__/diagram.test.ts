import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ErrorCode, isEdgeCell, isNodeCell } from '@tfmap/core';
import { buildCellsFromFile } from '../diagram.js';

describe('buildCellsFromFile', () => {
  let dir = '';

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  function inputFile(content: string): string {
    dir = mkdtempSync(join(tmpdir(), 'tfmap-diagram-test-'));
    const file = join(dir, 'data.json');
    writeFileSync(file, content);
    return file;
  }

  it('builds node and edge cells from components and flows', async () => {
    const file = inputFile(
      JSON.stringify({
        components: [
          { id: 'vpc', name: 'VPC', type: 'network' },
          { id: 'api', name: 'API', type: 'compute', parent_id: 'vpc' },
          { id: 'db', name: 'DB', type: 'storage', parent_id: 'vpc' },
        ],
        flows: [{ id: 'f1', source_id: 'api', target_id: 'db', name: 'queries' }],
      })
    );

    const cells = await buildCellsFromFile(file);

    expect(cells.filter(isNodeCell)).toHaveLength(3);
    expect(cells.filter(isEdgeCell)).toHaveLength(1);
  });

  it('fails with DIAGRAM_NO_DATA when the file has no JSON object', async () => {
    const file = inputFile('The model returned prose only.');
    await expect(buildCellsFromFile(file)).rejects.toMatchObject({
      code: ErrorCode.DIAGRAM_NO_DATA,
      message: 'No structured data: no JSON object found',
    });
  });

  it('fails with IO_FILE_NOT_FOUND for a missing file', async () => {
    dir = mkdtempSync(join(tmpdir(), 'tfmap-diagram-test-'));
    await expect(buildCellsFromFile(join(dir, 'missing.json'))).rejects.toMatchObject({
      code: ErrorCode.IO_FILE_NOT_FOUND,
    });
  });
});
