/**
 * Hierarchy Builder: Containment Tree
 *
 * Assigns every element the smallest-area element that fully contains it.
 * Elements are visited in ascending area order (stable on input order) and
 * only elements later in that order are considered as parents, so two
 * identical boxes nest the earlier inside the later instead of forming a cycle.
 *
 * O(n²); page element counts are in the tens.
 */

import { bboxArea, fullyInside } from './BBox';
import type { BBox } from './BBox';

export interface HasBBox {
  readonly bbox: BBox;
}

export class BlockTree<T extends HasBBox> {
  readonly roots: readonly T[];
  private readonly parentMap: ReadonlyMap<T, T>;
  private readonly childrenMap: ReadonlyMap<T, readonly T[]>;
  private readonly depthMap: ReadonlyMap<T, number>;

  constructor(
    roots: readonly T[],
    parentMap: ReadonlyMap<T, T>,
    childrenMap: ReadonlyMap<T, readonly T[]>,
    depthMap: ReadonlyMap<T, number>,
  ) {
    this.roots = roots;
    this.parentMap = parentMap;
    this.childrenMap = childrenMap;
    this.depthMap = depthMap;
  }

  getChildren(element: T): readonly T[] {
    return this.childrenMap.get(element) ?? [];
  }

  getParent(element: T): T | null {
    return this.parentMap.get(element) ?? null;
  }

  /** Every element nested below `element`, depth-first. */
  getDescendants(element: T): T[] {
    const result: T[] = [];
    for (const child of this.getChildren(element)) {
      result.push(child, ...this.getDescendants(child));
    }
    return result;
  }

  /** Chain of containers from the direct parent up to the root. */
  getAncestors(element: T): T[] {
    const result: T[] = [];
    let current = this.getParent(element);
    while (current !== null) {
      result.push(current);
      current = this.getParent(current);
    }
    return result;
  }

  getDepth(element: T): number {
    return this.depthMap.get(element) ?? 0;
  }

  isRoot(element: T): boolean {
    return !this.parentMap.has(element);
  }
}

export function buildHierarchy<T extends HasBBox>(elements: readonly T[]): BlockTree<T> {
  // The same object listed twice would otherwise contain itself
  const unique = Array.from(new Set(elements));

  // Array.prototype.sort is stable, so equal areas keep input order
  const byArea = [...unique].sort((a, b) => bboxArea(a.bbox) - bboxArea(b.bbox));

  const parentMap = new Map<T, T>();
  for (let i = 0; i < byArea.length; i++) {
    const element = byArea[i];
    for (let j = i + 1; j < byArea.length; j++) {
      // First container found later in ascending order is the smallest one
      if (fullyInside(element.bbox, byArea[j].bbox)) {
        parentMap.set(element, byArea[j]);
        break;
      }
    }
  }

  const childrenMap = new Map<T, T[]>();
  const roots: T[] = [];
  for (const el of unique) {
    const parent = parentMap.get(el);
    if (parent === undefined) {
      roots.push(el);
      continue;
    }
    const siblings = childrenMap.get(parent);
    if (siblings) {
      siblings.push(el);
    } else {
      childrenMap.set(parent, [el]);
    }
  }

  const depthMap = new Map<T, number>();
  const assignDepth = (el: T, depth: number): void => {
    depthMap.set(el, depth);
    for (const child of childrenMap.get(el) ?? []) assignDepth(child, depth + 1);
  };
  for (const root of roots) assignDepth(root, 0);

  return new BlockTree<T>(roots, parentMap, childrenMap, depthMap);
}
