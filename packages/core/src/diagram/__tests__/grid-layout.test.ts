import { describe, it, expect } from 'vitest';
import { GridLayoutEngine } from '../grid-layout.js';
import { HierarchyResolver } from '../hierarchy.js';
import type { Component, ComponentType } from '../../schemas/diagram-data.schema.js';

function comp(id: string, type: ComponentType, parent_id?: string): Component {
  return { id, name: id, type, parent_id };
}

function layout(components: Component[]) {
  return new GridLayoutEngine().layout(components, new HierarchyResolver(components));
}

describe('GridLayoutEngine', () => {
  it('should place two children side by side and shrink the boundary around them', () => {
    const rects = layout([comp('a', 'container'), comp('b', 'compute', 'a'), comp('c', 'storage', 'a')]);

    expect(rects.get('b')).toEqual({ x: 100, y: 100, width: 120, height: 60 });
    expect(rects.get('c')).toEqual({ x: 465, y: 100, width: 120, height: 60 });
    expect(rects.get('a')).toEqual({ x: 50, y: 50, width: 585, height: 300 });
  });

  it('should wrap five children onto a three-column grid', () => {
    const children = ['c0', 'c1', 'c2', 'c3', 'c4'].map((id) => comp(id, 'compute', 't'));
    const rects = layout([comp('t', 'tenancy'), ...children]);

    expect(children.map((c) => rects.get(c.id)).map((r) => [r?.x, r?.y])).toEqual([
      [100, 100],
      [343, 100],
      [586, 100],
      [100, 365],
      [343, 365],
    ]);
    expect(rects.get('t')).toEqual({ x: 50, y: 50, width: 706, height: 425 });
  });

  it('should lay out nested boundaries before resizing their ancestors', () => {
    const rects = layout([
      comp('t', 'tenancy'),
      comp('n', 'network', 't'),
      comp('svc', 'compute', 'n'),
    ]);

    expect(rects.get('svc')).toEqual({ x: 150, y: 150, width: 120, height: 60 });
    expect(rects.get('n')).toEqual({ x: 100, y: 100, width: 400, height: 300 });
    expect(rects.get('t')).toEqual({ x: 50, y: 50, width: 500, height: 400 });
  });

  it('should keep every child inside its boundary with padding', () => {
    const components = [
      comp('t', 'tenancy'),
      comp('c1', 'container', 't'),
      comp('c2', 'container', 't'),
      comp('a', 'compute', 'c1'),
      comp('b', 'gateway', 'c1'),
      comp('d', 'storage', 'c2'),
    ];
    const rects = layout(components);

    for (const component of components) {
      if (!component.parent_id) continue;
      const child = rects.get(component.id);
      const parent = rects.get(component.parent_id);
      expect(child).toBeDefined();
      expect(parent).toBeDefined();
      if (!child || !parent) continue;
      expect(child.x).toBeGreaterThanOrEqual(parent.x + 50);
      expect(child.y).toBeGreaterThanOrEqual(parent.y + 50);
      expect(child.x + child.width).toBeLessThanOrEqual(parent.x + parent.width - 50);
      expect(child.y + child.height).toBeLessThanOrEqual(parent.y + parent.height - 50);
    }
  });

  it('should stack tenancy roots downwards', () => {
    const rects = layout([comp('t1', 'tenancy'), comp('t2', 'tenancy')]);
    expect(rects.get('t1')).toEqual({ x: 50, y: 50, width: 800, height: 600 });
    expect(rects.get('t2')).toEqual({ x: 50, y: 700, width: 800, height: 600 });
  });

  it('should line up other roots to the right', () => {
    const rects = layout([comp('u1', 'actor'), comp('u2', 'actor'), comp('n', 'network')]);
    expect(rects.get('u1')).toMatchObject({ x: 50, y: 50 });
    expect(rects.get('u2')).toMatchObject({ x: 200, y: 50 });
    expect(rects.get('n')).toMatchObject({ x: 350, y: 50, width: 800, height: 600 });
  });

  it('should not sub-lay out children of a leaf node', () => {
    const rects = layout([comp('svc', 'compute'), comp('db', 'storage', 'svc')]);
    expect(rects.get('svc')).toEqual({ x: 50, y: 50, width: 120, height: 60 });
    expect(rects.get('db')).toEqual({ x: 0, y: 0, width: 120, height: 60 });
  });

  it('should produce identical layouts for identical input', () => {
    const components = [
      comp('t', 'tenancy'),
      comp('a', 'compute', 't'),
      comp('b', 'compute', 't'),
      comp('c', 'compute', 't'),
    ];
    expect([...layout(components)]).toEqual([...layout(components)]);
  });

  describe('gridPositions', () => {
    it('should return nothing for zero children', () => {
      expect(new GridLayoutEngine().gridPositions(0, { x: 0, y: 0, width: 800, height: 600 })).toEqual(
        []
      );
    });

    it('should honour overridden spacing settings', () => {
      const engine = new GridLayoutEngine({ boundaryPadding: 10, nodeSpacing: 0 });
      expect(engine.gridPositions(2, { x: 0, y: 0, width: 220, height: 100 })).toEqual([
        { x: 10, y: 10 },
        { x: 110, y: 10 },
      ]);
    });
  });
});
