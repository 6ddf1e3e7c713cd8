import type { Component, Flow } from '../schemas/diagram-data.schema.js';
import type {
  DiagramLogger,
  EdgeCell,
  EdgeEndpoint,
  MetadataEntry,
  NodeCell,
  PortGroup,
} from './diagram-types.js';
import { COLORS, EDGE_STYLE, SHAPES, Z_INDEX, createPorts } from './diagram-styles.js';
import type { Rect } from './grid-layout.js';

const ARROW_FORWARD = '→';
const ARROW_BACKWARD = '←';

interface EdgeSpec {
  sourceId: string;
  targetId: string;
  label: string;
}

export interface NodeCellInput {
  component: Component;
  rect: Rect;
  zIndex: number;
  parentCellId?: string;
}

/** Only processing nodes expose connection ports. */
export function hasPorts(component: Component): boolean {
  return component.type === 'compute' || component.type === 'gateway';
}

export function portFor(cell: NodeCell, group: PortGroup): string | undefined {
  return cell.ports?.items.find((item) => item.group === group)?.id;
}

function portText(flow: Flow): string | undefined {
  if (flow.port === null || flow.port === undefined || flow.port === '') return undefined;
  return String(flow.port);
}

/** `name (protocol:port)`, or just `name` when no protocol is known. */
export function formatEdgeLabel(base: string, flow: Flow): string {
  if (!flow.protocol) return base;
  const port = portText(flow);
  return port ? `${base} (${flow.protocol}:${port})` : `${base} (${flow.protocol})`;
}

function expandFlow(flow: Flow): EdgeSpec[] {
  const name = flow.name ?? flow.id;
  if (!flow.bidirectional) {
    return [{ sourceId: flow.source_id, targetId: flow.target_id, label: name }];
  }
  return [
    { sourceId: flow.source_id, targetId: flow.target_id, label: `${name} ${ARROW_FORWARD}` },
    { sourceId: flow.target_id, targetId: flow.source_id, label: `${name} ${ARROW_BACKWARD}` },
  ];
}

function flowMetadata(flow: Flow): MetadataEntry[] {
  const entries: MetadataEntry[] = [{ key: 'flow_id', value: flow.id }];
  if (flow.protocol) entries.push({ key: 'protocol', value: flow.protocol });
  const port = portText(flow);
  if (port) entries.push({ key: 'port', value: port });
  return entries;
}

/**
 * Turns laid-out components and flows into graph cells. Cell ids come from the
 * injected generator, so a deterministic generator gives byte-identical output.
 */
export class CellSynthesizer {
  constructor(
    private readonly nextId: () => string,
    private readonly logger?: DiagramLogger
  ) {}

  nodeCell({ component, rect, zIndex, parentCellId }: NodeCellInput): NodeCell {
    const cell: NodeCell = {
      id: this.nextId(),
      shape: SHAPES[component.type],
      x: rect.x,
      y: rect.y,
      width: rect.width,
      height: rect.height,
      zIndex,
      attrs: {
        body: { ...COLORS[component.type] },
        text: { text: component.name },
      },
      data: {
        _metadata: [
          { key: 'component_id', value: component.id },
          { key: 'component_type', value: component.type },
          { key: 'component_subtype', value: component.subtype ?? '' },
        ],
      },
    };
    if (parentCellId) cell.parent = parentCellId;
    if (hasPorts(component)) cell.ports = createPorts();
    return cell;
  }

  /**
   * One edge per flow, two for a bidirectional flow. Flows whose endpoints have
   * no cell are dropped with a warning.
   */
  edgeCells(flow: Flow, cellsByComponent: ReadonlyMap<string, NodeCell>): EdgeCell[] {
    const edges: EdgeCell[] = [];
    for (const spec of expandFlow(flow)) {
      const source = cellsByComponent.get(spec.sourceId);
      const target = cellsByComponent.get(spec.targetId);
      if (!source || !target) {
        this.logger?.warn(`Skipping flow ${flow.id}: source or target component not found`, {
          flowId: flow.id,
          sourceId: spec.sourceId,
          targetId: spec.targetId,
        });
        continue;
      }
      edges.push(this.edgeCell(spec, flow, source, target));
    }
    return edges;
  }

  private edgeCell(spec: EdgeSpec, flow: Flow, source: NodeCell, target: NodeCell): EdgeCell {
    return {
      id: this.nextId(),
      shape: 'edge',
      source: endpoint(source, 'out'),
      target: endpoint(target, 'in'),
      zIndex: Z_INDEX.edge,
      attrs: {
        line: {
          stroke: EDGE_STYLE.stroke,
          strokeWidth: EDGE_STYLE.strokeWidth,
          targetMarker: { ...EDGE_STYLE.targetMarker },
        },
      },
      labels: [{ attrs: { text: { text: formatEdgeLabel(spec.label, flow) } } }],
      router: { name: 'manhattan' },
      connector: { name: 'rounded' },
      data: { _metadata: flowMetadata(flow) },
    };
  }
}

function endpoint(cell: NodeCell, group: PortGroup): EdgeEndpoint {
  const port = portFor(cell, group);
  return port ? { cell: cell.id, port } : { cell: cell.id };
}
