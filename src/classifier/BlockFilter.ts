/**
 * Duplicate Block Filter
 *
 * PDFs often stack near-identical copies of a shape (drop shadows, outlines
 * drawn twice). Blocks of the same kind whose IoU reaches the threshold are
 * grouped transitively and only the largest of each group is kept.
 */

import { bboxArea, iou } from '../model/BBox';
import type { Block } from '../model/types';

export interface DuplicateFilterResult {
  /** Surviving blocks in their original order */
  kept: Block[];
  /** Removed block id -> id of the block kept in its place */
  removed: Map<number, number>;
}

export const DEFAULT_DUPLICATE_IOU_THRESHOLD = 0.8;

export function filterDuplicateBlocks(
  blocks: readonly Block[],
  threshold = DEFAULT_DUPLICATE_IOU_THRESHOLD,
): DuplicateFilterResult {
  const n = blocks.length;
  const parent = Array.from({ length: n }, (_, i) => i);

  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      if (blocks[i].kind !== blocks[j].kind) continue;
      if (iou(blocks[i].bbox, blocks[j].bbox) >= threshold) {
        const ri = find(i);
        const rj = find(j);
        if (ri !== rj) parent[rj] = ri;
      }
    }
  }

  const groups = new Map<number, number[]>();
  for (let i = 0; i < n; i++) {
    const root = find(i);
    const group = groups.get(root) ?? [];
    group.push(i);
    groups.set(root, group);
  }

  const keptIndices = new Set<number>();
  const removed = new Map<number, number>();
  for (const group of groups.values()) {
    // First of the largest wins ties
    let largest = group[0];
    for (const idx of group) {
      if (bboxArea(blocks[idx].bbox) > bboxArea(blocks[largest].bbox)) largest = idx;
    }
    keptIndices.add(largest);
    for (const idx of group) {
      if (idx !== largest) removed.set(blocks[idx].id, blocks[largest].id);
    }
  }

  return {
    kept: blocks.filter((_, i) => keptIndices.has(i)),
    removed,
  };
}
