import type { Component } from '../schemas/diagram-data.schema.js';
import { isBoundaryType } from './diagram-types.js';
import { LAYOUT, type LayoutSettings } from './diagram-styles.js';
import type { HierarchyResolver } from './hierarchy.js';

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type LayoutResult = ReadonlyMap<string, Rect>;

/** Boundary kinds that stack downwards when they sit at the root. */
function stacksVertically(component: Component): boolean {
  return component.type === 'tenancy' || component.type === 'container';
}

/**
 * Places every component on a nested grid. Boundaries start at their default
 * size and shrink or grow to wrap their direct children once those children
 * (and everything below them) are positioned.
 */
export class GridLayoutEngine {
  private readonly settings: LayoutSettings;

  constructor(settings: Partial<LayoutSettings> = {}) {
    this.settings = { ...LAYOUT, ...settings };
  }

  layout(components: readonly Component[], hierarchy: HierarchyResolver): LayoutResult {
    const rects = new Map<string, Rect>();
    for (const component of components) {
      rects.set(component.id, this.initialRect(component));
    }

    let xCursor = this.settings.margin;
    let yCursor = this.settings.margin;
    for (const root of hierarchy.roots()) {
      this.place(root, xCursor, yCursor, rects, hierarchy);
      const rect = rects.get(root.id);
      if (!rect) continue;
      if (stacksVertically(root)) {
        yCursor += rect.height + this.settings.boundaryPadding;
      } else {
        xCursor += rect.width + this.settings.nodeSpacing;
      }
    }

    return rects;
  }

  /** Grid origins for `count` children inside `parent`, in row-major order. */
  gridPositions(count: number, parent: Rect): { x: number; y: number }[] {
    if (count <= 0) return [];
    const { boundaryPadding: padding, nodeSpacing: spacing } = this.settings;
    const cols = Math.max(1, Math.ceil(Math.sqrt(count)));
    const rows = Math.ceil(count / cols);
    const cellWidth = Math.floor((parent.width - 2 * padding - (cols - 1) * spacing) / cols);
    const cellHeight = Math.floor((parent.height - 2 * padding - (rows - 1) * spacing) / rows);

    return Array.from({ length: count }, (_, i) => {
      const row = Math.floor(i / cols);
      const col = i % cols;
      return {
        x: parent.x + padding + col * (cellWidth + spacing),
        y: parent.y + padding + row * (cellHeight + spacing),
      };
    });
  }

  private initialRect(component: Component): Rect {
    return isBoundaryType(component.type)
      ? { x: 0, y: 0, width: this.settings.boundaryWidth, height: this.settings.boundaryHeight }
      : { x: 0, y: 0, width: this.settings.nodeWidth, height: this.settings.nodeHeight };
  }

  private place(
    component: Component,
    x: number,
    y: number,
    rects: Map<string, Rect>,
    hierarchy: HierarchyResolver
  ): void {
    const rect = rects.get(component.id);
    if (!rect) return;
    rect.x = x;
    rect.y = y;

    if (!isBoundaryType(component.type)) return;
    const children = hierarchy.childrenOf(component.id);
    if (children.length === 0) return;

    const positions = this.gridPositions(children.length, rect);
    children.forEach((child, i) => {
      const position = positions[i];
      if (position) this.place(child, position.x, position.y, rects, hierarchy);
    });

    this.fitToChildren(rect, children, rects);
  }

  private fitToChildren(boundary: Rect, children: Component[], rects: Map<string, Rect>): void {
    let maxRight = -Infinity;
    let maxBottom = -Infinity;
    for (const child of children) {
      const rect = rects.get(child.id);
      if (!rect) continue;
      maxRight = Math.max(maxRight, rect.x + rect.width);
      maxBottom = Math.max(maxBottom, rect.y + rect.height);
    }
    if (!Number.isFinite(maxRight) || !Number.isFinite(maxBottom)) return;

    const padding = this.settings.boundaryPadding;
    boundary.width = Math.max(maxRight - boundary.x + padding, this.settings.minBoundaryWidth);
    boundary.height = Math.max(maxBottom - boundary.y + padding, this.settings.minBoundaryHeight);
  }
}
