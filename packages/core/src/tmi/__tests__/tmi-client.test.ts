import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ApiError, ErrorCode } from '../../errors.js';
import type { NodeCell } from '../../diagram/diagram-types.js';
import { TmiClient } from '../tmi-client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestOf(call: Parameters<typeof fetch> | undefined) {
  const [url, init] = call ?? [];
  const body = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
  return { url: String(url), method: init?.method, body };
}

const cell: NodeCell = {
  id: 'cell-1',
  shape: 'process',
  x: 50,
  y: 50,
  width: 120,
  height: 60,
  zIndex: 11,
  attrs: { body: { fill: '#E1F5FE', stroke: '#03A9F4' }, text: { text: 'API' } },
  data: { _metadata: [{ key: 'component_id', value: 'api' }] },
};

describe('TmiClient', () => {
  let client: TmiClient;

  beforeEach(() => {
    vi.restoreAllMocks();
    client = new TmiClient('https://tmi.example.test/', 'test-token');
  });

  it('should send the bearer token and parse the threat model', async () => {
    const fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(jsonResponse({ id: 'tm-1', name: 'Payments', owner: 'sec' }));

    await expect(client.getThreatModel('tm-1')).resolves.toEqual({
      id: 'tm-1',
      name: 'Payments',
      owner: 'sec',
    });
    expect(fetchSpy).toHaveBeenCalledWith(
      'https://tmi.example.test/threat_models/tm-1',
      expect.objectContaining({
        method: 'GET',
        headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
      })
    );
  });

  it('should accept wrapped list responses', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ items: [{ uri: 'https://github.com/acme/infra', name: 'infra' }] })
    );

    await expect(client.listRepositories('tm-1')).resolves.toEqual([
      { uri: 'https://github.com/acme/infra', name: 'infra' },
    ]);
  });

  it('should map 401 to an authorization failure', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('token expired', { status: 401 })
    );

    const error: unknown = await client.getThreatModel('tm-1').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      code: ErrorCode.AUTH_PLATFORM_FAILURE,
      statusCode: 401,
      message: 'TMI API error (401): token expired',
    });
  });

  it('should wrap network failures', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

    await expect(client.listNotes('tm-1')).rejects.toMatchObject({
      name: 'ApiError',
      message: 'fetch failed',
      context: expect.objectContaining({ provider: 'tmi' }),
    });
  });

  describe('createOrUpdateNote', () => {
    it('should update a note with the same name', async () => {
      const fetchSpy = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(
          jsonResponse([
            { id: 'n-1', name: 'Other' },
            { id: 'n-2', name: 'Terraform Analysis Report' },
          ])
        )
        .mockResolvedValueOnce(jsonResponse({ id: 'n-2', name: 'Terraform Analysis Report' }));

      const note = await client.createOrUpdateNote('tm-1', {
        name: 'Terraform Analysis Report',
        content: '# Report',
      });

      expect(note.id).toBe('n-2');
      expect(requestOf(fetchSpy.mock.calls[1])).toEqual({
        url: 'https://tmi.example.test/threat_models/tm-1/notes/n-2',
        method: 'PUT',
        body: { name: 'Terraform Analysis Report', content: '# Report', description: '' },
      });
    });

    it('should create the note when none matches', async () => {
      const fetchSpy = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(jsonResponse([]))
        .mockResolvedValueOnce(jsonResponse({ id: 'n-9', name: 'Report' }));

      await client.createOrUpdateNote('tm-1', {
        name: 'Report',
        content: 'x',
        description: 'Automated',
      });

      expect(requestOf(fetchSpy.mock.calls[1])).toEqual({
        url: 'https://tmi.example.test/threat_models/tm-1/notes',
        method: 'POST',
        body: { name: 'Report', content: 'x', description: 'Automated' },
      });
    });
  });

  describe('createOrUpdateDiagram', () => {
    it('should create a DFD diagram and then store its cells', async () => {
      const fetchSpy = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(jsonResponse([]))
        .mockResolvedValueOnce(jsonResponse({ id: 'd-1', name: 'Flows', type: 'DFD-1.0.0' }))
        .mockResolvedValueOnce(jsonResponse({ id: 'd-1', name: 'Flows', type: 'DFD-1.0.0' }));

      const diagram = await client.createOrUpdateDiagram('tm-1', 'Flows', [cell]);

      expect(diagram.id).toBe('d-1');
      expect(requestOf(fetchSpy.mock.calls[1])).toEqual({
        url: 'https://tmi.example.test/threat_models/tm-1/diagrams',
        method: 'POST',
        body: { name: 'Flows', type: 'DFD-1.0.0' },
      });
      expect(requestOf(fetchSpy.mock.calls[2])).toEqual({
        url: 'https://tmi.example.test/threat_models/tm-1/diagrams/d-1',
        method: 'PUT',
        body: { name: 'Flows', type: 'DFD-1.0.0', cells: [cell] },
      });
    });

    it('should reuse an existing diagram', async () => {
      const fetchSpy = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(jsonResponse([{ id: 'd-7', name: 'Flows' }]))
        .mockResolvedValueOnce(jsonResponse({ id: 'd-7', name: 'Flows' }));

      await client.createOrUpdateDiagram('tm-1', 'Flows', []);

      expect(fetchSpy).toHaveBeenCalledTimes(2);
      expect(requestOf(fetchSpy.mock.calls[1]).url).toBe(
        'https://tmi.example.test/threat_models/tm-1/diagrams/d-7'
      );
    });
  });
});
