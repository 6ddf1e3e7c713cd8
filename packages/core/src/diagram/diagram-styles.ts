import type { ComponentType } from '../schemas/diagram-data.schema.js';
import type { NodeShape, PortConfig } from './diagram-types.js';

export const SHAPES: Record<ComponentType, NodeShape> = {
  tenancy: 'security-boundary',
  container: 'security-boundary',
  network: 'security-boundary',
  gateway: 'process',
  compute: 'process',
  storage: 'store',
  actor: 'actor',
};

export const COLORS: Record<ComponentType, { fill: string; stroke: string }> = {
  tenancy: { fill: '#FFF3E0', stroke: '#FF9800' },
  container: { fill: '#E3F2FD', stroke: '#2196F3' },
  network: { fill: '#F3E5F5', stroke: '#9C27B0' },
  gateway: { fill: '#E8F5E9', stroke: '#4CAF50' },
  compute: { fill: '#E1F5FE', stroke: '#03A9F4' },
  storage: { fill: '#FFF9C4', stroke: '#FBC02D' },
  actor: { fill: '#FFEBEE', stroke: '#F44336' },
};

/** Paint order: boundaries by depth, then leaves, then edges on top. */
export const Z_INDEX = {
  boundaryBase: 1,
  boundaryIncrement: 1,
  boundaryMax: 9,
  gateway: 10,
  compute: 11,
  storage: 11,
  actor: 11,
  edge: 20,
} as const;

export const LAYOUT = {
  margin: 50,
  boundaryPadding: 50,
  nodeSpacing: 30,
  nodeWidth: 120,
  nodeHeight: 60,
  boundaryWidth: 800,
  boundaryHeight: 600,
  minBoundaryWidth: 400,
  minBoundaryHeight: 300,
} as const;

export type LayoutSettings = { readonly [K in keyof typeof LAYOUT]: number };

export const EDGE_STYLE = {
  stroke: '#333333',
  strokeWidth: 2,
  targetMarker: { name: 'block', width: 12, height: 8 },
} as const;

export const PORT_IDS = { in: 'port-in', out: 'port-out' } as const;

export function createPorts(): PortConfig {
  return {
    groups: {
      in: { position: 'left' },
      out: { position: 'right' },
    },
    items: [
      { id: PORT_IDS.in, group: 'in' },
      { id: PORT_IDS.out, group: 'out' },
    ],
  };
}
