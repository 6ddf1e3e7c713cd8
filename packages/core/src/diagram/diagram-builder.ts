import { randomUUID } from 'crypto';
import type { Component, Flow } from '../schemas/diagram-data.schema.js';
import { parseDiagramData } from '../analysis/structured-data.js';
import { TfmapError } from '../errors.js';
import { debugLog } from '../utils/debug-log.js';
import type {
  DiagramBuildOptions,
  DiagramCell,
  DiagramLogger,
  EdgeCell,
  NodeCell,
} from './diagram-types.js';
import { CellSynthesizer } from './cell-synthesizer.js';
import { GridLayoutEngine } from './grid-layout.js';
import { HierarchyResolver } from './hierarchy.js';

export type BuildFromTextResult = { ok: true; cells: DiagramCell[] } | { ok: false; reason: string };

export const defaultDiagramLogger: DiagramLogger = {
  warn(message, data) {
    console.error(`[diagram] ${message}`, data !== undefined ? JSON.stringify(data) : '');
  },
  debug(message, data) {
    debugLog('diagram', message, data);
  },
};

/**
 * Builds a complete data flow diagram (boundaries, nodes, edges) from
 * validated components and flows. Every call works on its own state; either
 * the full cell list is returned or a {@link DiagramBuildError} is thrown
 * before any cell is produced.
 */
export class DiagramBuilder {
  private readonly components: readonly Component[];
  private readonly flows: readonly Flow[];
  private readonly idGenerator: () => string;
  private readonly logger: DiagramLogger;

  constructor(components: readonly Component[], flows: readonly Flow[], options: DiagramBuildOptions = {}) {
    this.components = components;
    this.flows = flows;
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.logger = options.logger ?? defaultDiagramLogger;
  }

  build(): DiagramCell[] {
    this.logger.debug('Building diagram cells', {
      components: this.components.length,
      flows: this.flows.length,
    });

    const hierarchy = new HierarchyResolver(this.components);
    const rects = new GridLayoutEngine().layout(this.components, hierarchy);
    const synthesizer = new CellSynthesizer(this.idGenerator, this.logger);

    const cellsByComponent = new Map<string, NodeCell>();
    const nodes: NodeCell[] = [];
    for (const component of [...hierarchy.boundariesByDepth(), ...hierarchy.leaves()]) {
      const rect = rects.get(component.id);
      if (!rect) continue;
      const parentCellId = component.parent_id
        ? cellsByComponent.get(component.parent_id)?.id
        : undefined;
      const cell = synthesizer.nodeCell({
        component,
        rect,
        zIndex: hierarchy.zIndexOf(component),
        parentCellId,
      });
      if (!cellsByComponent.has(component.id)) cellsByComponent.set(component.id, cell);
      nodes.push(cell);
    }

    const edges: EdgeCell[] = this.flows.flatMap((flow) =>
      synthesizer.edgeCells(flow, cellsByComponent)
    );

    this.logger.debug('Generated diagram cells', { nodes: nodes.length, edges: edges.length });
    return [...nodes, ...edges];
  }
}

/**
 * Extract, validate and build in one step. Extraction and validation
 * failures come back as a value; structural failures keep their
 * {@link TfmapError} message.
 */
export function buildDiagramFromText(
  text: string,
  options: DiagramBuildOptions = {}
): BuildFromTextResult {
  const parsed = parseDiagramData(text);
  if (!parsed.valid) {
    return { ok: false, reason: `No structured data: ${parsed.issues.join('; ')}` };
  }
  try {
    const cells = new DiagramBuilder(parsed.data.components, parsed.data.flows, options).build();
    return { ok: true, cells };
  } catch (error) {
    if (error instanceof TfmapError) {
      return { ok: false, reason: error.message };
    }
    throw error;
  }
}
