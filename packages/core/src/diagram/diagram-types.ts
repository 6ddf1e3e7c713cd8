import type { ComponentType } from '../schemas/diagram-data.schema.js';
import { BOUNDARY_TYPES } from '../schemas/diagram-data.schema.js';

export type BoundaryType = (typeof BOUNDARY_TYPES)[number];

export type NodeShape = 'security-boundary' | 'process' | 'store' | 'actor';

export type PortGroup = 'in' | 'out';

export interface MetadataEntry {
  key: string;
  value: string;
}

export interface PortItem {
  id: string;
  group: PortGroup;
}

export interface PortConfig {
  groups: Record<PortGroup, { position: 'left' | 'right' }>;
  items: PortItem[];
}

export interface NodeCell {
  id: string;
  shape: NodeShape;
  x: number;
  y: number;
  width: number;
  height: number;
  zIndex: number;
  parent?: string;
  ports?: PortConfig;
  attrs: {
    body: { fill: string; stroke: string };
    text: { text: string };
  };
  data: { _metadata: MetadataEntry[] };
}

export interface EdgeEndpoint {
  cell: string;
  port?: string;
}

export interface EdgeCell {
  id: string;
  shape: 'edge';
  source: EdgeEndpoint;
  target: EdgeEndpoint;
  zIndex: number;
  attrs: {
    line: {
      stroke: string;
      strokeWidth: number;
      targetMarker: { name: string; width: number; height: number };
    };
  };
  labels: { attrs: { text: { text: string } } }[];
  router: { name: 'manhattan' };
  connector: { name: 'rounded' };
  data: { _metadata: MetadataEntry[] };
}

export type DiagramCell = NodeCell | EdgeCell;

export interface DiagramLogger {
  warn(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface DiagramBuildOptions {
  /** Mints cell ids. Defaults to random UUIDs. */
  idGenerator?: () => string;
  logger?: DiagramLogger;
}

export function isBoundaryType(type: ComponentType): type is BoundaryType {
  switch (type) {
    case 'tenancy':
    case 'container':
    case 'network':
      return true;
    case 'gateway':
    case 'compute':
    case 'storage':
    case 'actor':
      return false;
    default: {
      const _exhaustive: never = type;
      return _exhaustive;
    }
  }
}

export function isEdgeCell(cell: DiagramCell): cell is EdgeCell {
  return cell.shape === 'edge';
}

export function isNodeCell(cell: DiagramCell): cell is NodeCell {
  return cell.shape !== 'edge';
}
