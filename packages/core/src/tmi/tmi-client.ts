import { z } from 'zod';
import { ApiError } from '../errors.js';
import type { DiagramCell } from '../diagram/diagram-types.js';
import { debugLog } from '../utils/debug-log.js';
import { sanitizeErrorMessage } from '../utils/error-utils.js';
import {
  DFD_DIAGRAM_TYPE,
  DiagramSchema,
  NoteSchema,
  ThreatModelSchema,
  TmiRepositorySchema,
  listOf,
} from '../schemas/tmi-api.schema.js';
import type { Diagram, Note, NoteInput, ThreatModel, TmiRepository } from '../schemas/tmi-api.schema.js';

interface TmiRequestOptions {
  method?: 'GET' | 'POST' | 'PUT';
  body?: unknown;
}

/** Threat model, note and diagram endpoints of a TMI server. */
export class TmiClient {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly token: string
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async request<T>(path: string, schema: z.ZodType<T>, options: TmiRequestOptions = {}): Promise<T> {
    const method = options.method ?? 'GET';
    debugLog('tmi', `${method} ${path}`);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: 'application/json',
          ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        ...(options.body !== undefined ? { body: JSON.stringify(options.body) } : {}),
      });
    } catch (error) {
      throw ApiError.fromTmiError(error);
    }

    if (!response.ok) {
      const text = await response.text().catch((): string => 'Unknown error');
      throw new ApiError(
        `TMI API error (${String(response.status)}): ${sanitizeErrorMessage(text.slice(0, 200))}`,
        response.status,
        { provider: 'tmi', path }
      );
    }
    const json: unknown = await response.json();
    return schema.parse(json);
  }

  private threatModelPath(threatModelId: string): string {
    return `/threat_models/${encodeURIComponent(threatModelId)}`;
  }

  getThreatModel(threatModelId: string): Promise<ThreatModel> {
    return this.request(this.threatModelPath(threatModelId), ThreatModelSchema);
  }

  listRepositories(threatModelId: string): Promise<TmiRepository[]> {
    return this.request(
      `${this.threatModelPath(threatModelId)}/repositories`,
      listOf(TmiRepositorySchema)
    );
  }

  listNotes(threatModelId: string): Promise<Note[]> {
    return this.request(`${this.threatModelPath(threatModelId)}/notes`, listOf(NoteSchema));
  }

  createNote(threatModelId: string, note: NoteInput): Promise<Note> {
    return this.request(`${this.threatModelPath(threatModelId)}/notes`, NoteSchema, {
      method: 'POST',
      body: { description: '', ...note },
    });
  }

  updateNote(threatModelId: string, noteId: string, note: NoteInput): Promise<Note> {
    return this.request(
      `${this.threatModelPath(threatModelId)}/notes/${encodeURIComponent(noteId)}`,
      NoteSchema,
      { method: 'PUT', body: { description: '', ...note } }
    );
  }

  /** Replaces the note with the same name, or creates one. */
  async createOrUpdateNote(threatModelId: string, note: NoteInput): Promise<Note> {
    const existing = (await this.listNotes(threatModelId)).find((n) => n.name === note.name);
    if (existing) {
      debugLog('tmi', `Updating note "${note.name}"`, { noteId: existing.id });
      return this.updateNote(threatModelId, existing.id, note);
    }
    debugLog('tmi', `Creating note "${note.name}"`);
    return this.createNote(threatModelId, note);
  }

  listDiagrams(threatModelId: string): Promise<Diagram[]> {
    return this.request(`${this.threatModelPath(threatModelId)}/diagrams`, listOf(DiagramSchema));
  }

  createDiagram(threatModelId: string, name: string): Promise<Diagram> {
    return this.request(`${this.threatModelPath(threatModelId)}/diagrams`, DiagramSchema, {
      method: 'POST',
      body: { name, type: DFD_DIAGRAM_TYPE },
    });
  }

  updateDiagramCells(
    threatModelId: string,
    diagram: Diagram,
    cells: DiagramCell[]
  ): Promise<Diagram> {
    return this.request(
      `${this.threatModelPath(threatModelId)}/diagrams/${encodeURIComponent(diagram.id)}`,
      DiagramSchema,
      { method: 'PUT', body: { name: diagram.name, type: DFD_DIAGRAM_TYPE, cells } }
    );
  }

  /** Replaces the cells of the diagram with the same name, creating it first if needed. */
  async createOrUpdateDiagram(
    threatModelId: string,
    name: string,
    cells: DiagramCell[]
  ): Promise<Diagram> {
    const existing = (await this.listDiagrams(threatModelId)).find((d) => d.name === name);
    const diagram = existing ?? (await this.createDiagram(threatModelId, name));
    debugLog('tmi', `${existing ? 'Updating' : 'Created'} diagram "${name}"`, {
      diagramId: diagram.id,
      cells: cells.length,
    });
    return this.updateDiagramCells(threatModelId, diagram, cells);
  }
}
