/**
 * Test factories: blocks, pages, configs and per-page results.
 *
 * Boxes are written as [x0, y0, x1, y1] tuples; every factory takes an
 * explicit block id so expectations can name blocks directly.
 */

import { createBBox } from '../model/BBox';
import type { BBox } from '../model/BBox';
import type { Block, DrawingBlock, ImageBlock, PageData, TextBlock } from '../model/types';
import { ClassificationResult } from '../classifier/ClassificationResult';
import { loadClassifierConfig } from '../classifier/ClassifierConfig';
import type { ClassifierConfig, ClassifierConfigInput } from '../classifier/ClassifierConfig';
import { emptyHints } from '../classifier/hints';
import type { ClassifierHints, LabelClassifier } from '../classifier/types';

export type Box = readonly [number, number, number, number];

export function box([x0, y0, x1, y1]: Box): BBox {
  return createBBox(x0, y0, x1, y1);
}

export function makeText(
  id: number,
  bbox: Box,
  text: string,
  overrides: Partial<Omit<TextBlock, 'kind' | 'id' | 'bbox' | 'text'>> = {},
): TextBlock {
  return { kind: 'text', id, bbox: box(bbox), text, fontName: null, fontSize: null, ...overrides };
}

export function makeDrawing(
  id: number,
  bbox: Box,
  overrides: Partial<Omit<DrawingBlock, 'kind' | 'id' | 'bbox'>> = {},
): DrawingBlock {
  return {
    kind: 'drawing',
    id,
    bbox: box(bbox),
    fillColor: null,
    strokeColor: null,
    lineWidth: null,
    items: [],
    imageId: null,
    ...overrides,
  };
}

export function makeImage(id: number, bbox: Box, imageId: string | null = null): ImageBlock {
  return { kind: 'image', id, bbox: box(bbox), imageId };
}

export function makePage(blocks: readonly Block[], pageNumber = 1, bbox: Box = [0, 0, 200, 300]): PageData {
  return { pageNumber, bbox: box(bbox), blocks };
}

/** Stock config with invariant violations thrown, whatever NODE_ENV says */
export function makeConfig(overrides: ClassifierConfigInput = {}): ClassifierConfig {
  return loadClassifierConfig({ strictInvariants: true, ...overrides });
}

export function makeResult(page: PageData, hints: ClassifierHints = emptyHints()): ClassificationResult {
  return new ClassificationResult(page, hints, { nearDuplicateIouThreshold: 0.7 });
}

/**
 * Score, build and greedily accept each classifier's candidates in turn,
 * without winner groups or the constraint solver.
 */
export function runClassifiers(result: ClassificationResult, classifiers: readonly LabelClassifier[]): void {
  for (const classifier of classifiers) {
    classifier.score(result);
    for (const candidate of result.getCandidates(classifier.output)) {
      const built = classifier.build(candidate, result);
      if (built.ok) candidate.constructed = built.value;
      else candidate.failureReason = built.error;
    }
    for (const candidate of result.getScoredCandidates(classifier.output)) {
      if (result.isEligible(candidate)) result.accept(candidate, classifier.removal);
    }
  }
}

// ─── Scenes ──────────────────────────────────────────────────

/**
 * Page 6 of a build: page number "6" bottom right, step "10" mid-page, a
 * parts-list frame (block 3) holding two images over "2x" and "5×", and an
 * empty drawing (block 8) to the right of the frame.
 */
export function makeStepPage(pageNumber = 6, firstId = 1): PageData {
  const id = (n: number) => firstId + n - 1;
  return makePage(
    [
      makeText(id(1), [185, 285, 195, 295], String(pageNumber), { fontSize: 12 }),
      makeText(id(2), [10, 150, 40, 180], '10', { fontSize: 30 }),
      makeDrawing(id(3), [10, 20, 110, 100], { strokeColor: { r: 0, g: 0, b: 0 } }),
      makeImage(id(4), [15, 25, 45, 55], 'img_1'),
      makeImage(id(5), [60, 25, 90, 55], 'img_2'),
      makeText(id(6), [15, 58, 27, 68], '2x', { fontSize: 10 }),
      makeText(id(7), [60, 58, 72, 68], '5×', { fontSize: 10 }),
      makeDrawing(id(8), [120, 20, 190, 100], { fillColor: { r: 0.5, g: 0.5, b: 0.5 } }),
    ],
    pageNumber,
  );
}

/**
 * Two stacked frames (blocks 3 and 4, IoU ~0.99) over the same two parts,
 * above step numbers "1" (left) and "2" (right).
 */
export function makeStackedFramePage(): PageData {
  return makePage([
    makeText(1, [185, 285, 195, 295], '1', { fontSize: 12 }),
    makeText(2, [10, 150, 30, 175], '1', { fontSize: 25 }),
    makeDrawing(3, [10, 20, 110, 100]),
    makeDrawing(4, [10, 20, 110, 101]),
    makeImage(5, [15, 25, 45, 55]),
    makeImage(6, [60, 25, 90, 55]),
    makeText(7, [15, 58, 27, 68], '2x', { fontSize: 10 }),
    makeText(8, [60, 58, 72, 68], '5×', { fontSize: 10 }),
    makeText(9, [120, 150, 140, 175], '2', { fontSize: 25 }),
  ]);
}
