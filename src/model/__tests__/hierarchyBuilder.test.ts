/**
 * Unit Tests: Containment Hierarchy
 *
 * buildHierarchy(elements) assigns each element its smallest container.
 */
import { describe, test, expect } from 'vitest';
import { createBBox } from '../BBox';
import { buildHierarchy } from '../HierarchyBuilder';

function makeNode(name: string, x0: number, y0: number, x1: number, y1: number) {
  return { name, bbox: createBBox(x0, y0, x1, y1) };
}

describe('buildHierarchy', () => {
  test('a contained box becomes a child of its container', () => {
    const outer = makeNode('A', 0, 0, 100, 100);
    const inner = makeNode('B', 10, 10, 20, 20);
    const tree = buildHierarchy([outer, inner]);

    expect(tree.roots).toEqual([outer]);
    expect(tree.isRoot(outer)).toBe(true);
    expect(tree.getParent(inner)).toBe(outer);
    expect(tree.getChildren(outer)).toEqual([inner]);
    expect(tree.getDepth(inner)).toBe(1);
  });

  test('the smallest container is the parent', () => {
    const page = makeNode('page', 0, 0, 100, 100);
    const panel = makeNode('panel', 5, 5, 50, 50);
    const item = makeNode('item', 10, 10, 20, 20);
    const tree = buildHierarchy([item, page, panel]);

    expect(tree.getParent(item)).toBe(panel);
    expect(tree.getAncestors(item)).toEqual([panel, page]);
    expect(tree.getDepth(item)).toBe(2);
    expect(tree.getDescendants(page)).toEqual([panel, item]);
  });

  test('identical boxes nest the earlier inside the later', () => {
    const first = makeNode('first', 0, 0, 10, 10);
    const second = makeNode('second', 0, 0, 10, 10);
    const tree = buildHierarchy([first, second]);

    expect(tree.getParent(first)).toBe(second);
    expect(tree.roots).toEqual([second]);
  });

  test('the same element listed twice does not contain itself', () => {
    const only = makeNode('A', 0, 0, 10, 10);
    const tree = buildHierarchy([only, only]);

    expect(tree.roots).toEqual([only]);
    expect(tree.getParent(only)).toBeNull();
  });

  test('partially overlapping boxes are both roots', () => {
    const left = makeNode('L', 0, 0, 10, 10);
    const right = makeNode('R', 5, 0, 15, 10);
    const tree = buildHierarchy([left, right]);

    expect(tree.roots).toEqual([left, right]);
    expect(tree.getChildren(left)).toEqual([]);
  });
});
