import type { Component } from '../schemas/diagram-data.schema.js';
import { DiagramBuildError, ErrorCode } from '../errors.js';
import { isBoundaryType } from './diagram-types.js';
import { Z_INDEX } from './diagram-styles.js';

/**
 * Containment tree over a flat component list.
 *
 * Components are kept in an index arena in input order; parent links are
 * resolved once up front so a dangling `parent_id` or a cycle is reported
 * before anything is laid out.
 */
export class HierarchyResolver {
  private readonly components: readonly Component[];
  private readonly indexById = new Map<string, number>();
  private readonly parentIndex: (number | undefined)[];
  private readonly childIndexes: number[][];
  private readonly depths: (number | undefined)[];

  constructor(components: readonly Component[]) {
    this.components = components;
    components.forEach((component, index) => {
      if (!this.indexById.has(component.id)) {
        this.indexById.set(component.id, index);
      }
    });

    this.childIndexes = components.map(() => []);
    this.parentIndex = components.map((component, index) => {
      if (!component.parent_id) return undefined;
      const parent = this.indexById.get(component.parent_id);
      if (parent === undefined) {
        throw DiagramBuildError.unknownParent(component.id, component.parent_id);
      }
      this.childIndexes[parent]?.push(index);
      return parent;
    });

    this.depths = components.map(() => undefined);
    components.forEach((_, index) => {
      this.resolveDepth(index);
    });
  }

  private resolveDepth(start: number): number {
    const chain: number[] = [];
    const visiting = new Set<number>();
    let current: number | undefined = start;

    while (current !== undefined && this.depths[current] === undefined) {
      if (visiting.has(current)) {
        const loopStart = chain.indexOf(current);
        const loop = [...chain.slice(loopStart), current].map((i) => this.idAt(i));
        throw DiagramBuildError.cycle(loop);
      }
      visiting.add(current);
      chain.push(current);
      current = this.parentIndex[current];
    }

    let depth = current === undefined ? -1 : (this.depths[current] ?? -1);
    for (let i = chain.length - 1; i >= 0; i--) {
      depth += 1;
      const index = chain[i];
      if (index !== undefined) this.depths[index] = depth;
    }
    return this.depths[start] ?? 0;
  }

  private idAt(index: number): string {
    return this.components[index]?.id ?? `#${String(index)}`;
  }

  private indexOf(id: string): number {
    const index = this.indexById.get(id);
    if (index === undefined) {
      throw new DiagramBuildError(
        `Unknown component "${id}"`,
        ErrorCode.DIAGRAM_INVALID_REFERENCE,
        id
      );
    }
    return index;
  }

  depth(id: string): number {
    return this.depths[this.indexOf(id)] ?? 0;
  }

  parentOf(id: string): Component | undefined {
    const parent = this.parentIndex[this.indexOf(id)];
    return parent === undefined ? undefined : this.components[parent];
  }

  childrenOf(id: string): Component[] {
    const children = this.childIndexes[this.indexOf(id)] ?? [];
    return children.flatMap((i) => {
      const child = this.components[i];
      return child ? [child] : [];
    });
  }

  roots(): Component[] {
    return this.components.filter((_, index) => this.parentIndex[index] === undefined);
  }

  /** Boundary components with every ancestor ahead of its descendants. */
  boundariesByDepth(): Component[] {
    return this.components
      .map((component, index) => ({ component, index }))
      .filter(({ component }) => isBoundaryType(component.type))
      .sort((a, b) => this.depthAt(a.index) - this.depthAt(b.index) || a.index - b.index)
      .map(({ component }) => component);
  }

  leaves(): Component[] {
    return this.components.filter((component) => !isBoundaryType(component.type));
  }

  zIndexOf(component: Component): number {
    switch (component.type) {
      case 'tenancy':
      case 'container':
      case 'network':
        return Math.min(
          Z_INDEX.boundaryBase + this.depth(component.id) * Z_INDEX.boundaryIncrement,
          Z_INDEX.boundaryMax
        );
      case 'gateway':
        return Z_INDEX.gateway;
      case 'compute':
        return Z_INDEX.compute;
      case 'storage':
        return Z_INDEX.storage;
      case 'actor':
        return Z_INDEX.actor;
      default: {
        const _exhaustive: never = component.type;
        return _exhaustive;
      }
    }
  }

  private depthAt(index: number): number {
    return this.depths[index] ?? 0;
  }
}
