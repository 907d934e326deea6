/**
 * Unit Tests: Leaf Classifiers
 *
 * Scoring and element construction for the labels read straight off single
 * blocks: page numbers, step numbers, part counts, element ids, bag numbers,
 * backgrounds, progress bars and dividers.
 */
import { describe, test, expect } from 'vitest';
import { createBBox } from '../../model/BBox';
import { emptyFontSizeHints } from '../hints/FontSizeHints';
import { PageHints } from '../hints/PageHints';
import { RuleScore } from '../Score';
import type { ClassifierHints } from '../types';
import {
  BackgroundClassifier,
  BagNumberClassifier,
  DividerClassifier,
  PageNumberClassifier,
  PartCountClassifier,
  PartNumberClassifier,
  ProgressBarClassifier,
  StepNumberClassifier,
} from '../classifiers';
import { makeConfig, makeDrawing, makeImage, makePage, makeResult, makeStepPage, makeText } from '../../test/factories';

const config = makeConfig();
const noComponents: Readonly<Record<string, number>> = {};

function unwrapBuilt<T>(built: { ok: true; value: T } | { ok: false; error: string }): T {
  if (!built.ok) throw new Error(built.error);
  return built.value;
}

describe('PageNumberClassifier', () => {
  const classifier = new PageNumberClassifier(config);

  test('picks the numeral in the bottom corner', () => {
    const result = makeResult(makeStepPage());
    classifier.score(result);

    const candidates = result.getCandidates('page_number');
    expect(candidates.map(c => c.sourceBlocks[0].id)).toEqual([1]);
    expect(candidates[0].score).toBeCloseTo(0.9648, 4);
    expect(unwrapBuilt(classifier.build(candidates[0]))).toEqual({
      kind: 'PageNumber',
      bbox: createBBox(185, 285, 195, 295),
      value: 6,
    });
  });

  test('reads prefixed page numbers', () => {
    const result = makeResult(makePage([makeText(1, [150, 285, 195, 295], 'Page 6', { fontSize: 12 })], 6));
    classifier.score(result);
    const [candidate] = result.getCandidates('page_number');
    expect(unwrapBuilt(classifier.build(candidate)).value).toBe(6);
  });

  test('ignores numerals above the bottom band', () => {
    const result = makeResult(makePage([makeText(1, [185, 100, 195, 110], '6', { fontSize: 12 })], 6));
    classifier.score(result);
    expect(result.getCandidates('page_number')).toHaveLength(0);
  });
});

describe('StepNumberClassifier', () => {
  const classifier = new StepNumberClassifier(config);

  test('takes the bare integer outside the bottom band', () => {
    const result = makeResult(makeStepPage());
    classifier.score(result);

    const [candidate, ...rest] = result.getCandidates('step_number');
    expect(rest).toHaveLength(0);
    expect(candidate.sourceBlocks[0].id).toBe(2);
    expect(candidate.score).toBe(1);
    expect(unwrapBuilt(classifier.build(candidate)).value).toBe(10);
    expect(classifier.winnerGroup(candidate)).toBe('step:10');
  });

  test('numerals printed inside an image are artwork', () => {
    const page = makePage([makeImage(1, [0, 0, 100, 100]), makeText(2, [10, 10, 30, 40], '3', { fontSize: 30 })]);
    const result = makeResult(page);
    classifier.score(result);
    expect(result.getCandidates('step_number')).toHaveLength(0);
  });
});

describe('PartCountClassifier', () => {
  const classifier = new PartCountClassifier(config);

  test('finds both counts in the parts list', () => {
    const result = makeResult(makeStepPage());
    classifier.score(result);

    const candidates = result.getCandidates('part_count');
    expect(candidates.map(c => c.sourceBlocks[0].id)).toEqual([6, 7]);
    expect(candidates.map(c => unwrapBuilt(classifier.build(c, result)).count)).toEqual([2, 5]);
    expect(unwrapBuilt(classifier.build(candidates[0], result)).matchedHint).toBeNull();
  });

  test('font size toward the ideal raises the size component alone', () => {
    const page = makePage([6, 8, 10].map((size, i) => makeText(i + 1, [10, 20 + 30 * i, 22, 30 + 30 * i], '2x', { fontSize: size })));
    const result = makeResult(page);
    classifier.score(result);

    const components = result.getCandidates('part_count').map(c =>
      c.scoreDetails instanceof RuleScore ? c.scoreDetails.components : noComponents,
    );
    expect(components.map(c => c.part_count_text)).toEqual([1, 1, 1]);
    expect(components[0].font_size).toBeCloseTo(0.2, 10);
    expect(components[1].font_size).toBeCloseTo(0.6, 10);
    expect(components[2].font_size).toBeCloseTo(1, 10);
  });

  test('reports which document size the count matched', () => {
    const hints: ClassifierHints = {
      fontSizes: { ...emptyFontSizeHints(), partCountSize: 10, catalogPartCountSize: 7 },
      pages: PageHints.empty(),
    };
    const page = makePage([makeText(1, [10, 10, 22, 20], '2x', { fontSize: 10 }), makeText(2, [10, 40, 20, 47], '3x', { fontSize: 7 })]);
    const result = makeResult(page, hints);
    classifier.score(result);

    expect(result.getCandidates('part_count').map(c => unwrapBuilt(classifier.build(c, result)).matchedHint)).toEqual([
      'part_count',
      'catalog_part_count',
    ]);
  });
});

describe('PartNumberClassifier', () => {
  test('builds element ids', () => {
    const classifier = new PartNumberClassifier(config);
    const result = makeResult(makePage([makeText(1, [10, 70, 40, 76], '6012345', { fontSize: 6 })]));
    classifier.score(result);

    const [candidate] = result.getCandidates('part_number');
    expect(candidate.score).toBeCloseTo(0.97235, 10);
    expect(unwrapBuilt(classifier.build(candidate))).toEqual({
      kind: 'PartNumber',
      bbox: createBBox(10, 70, 40, 76),
      elementId: '6012345',
    });
  });
});

describe('BagNumberClassifier', () => {
  const classifier = new BagNumberClassifier(config);

  test('takes a numeral in the top-left region', () => {
    const result = makeResult(makePage([makeText(1, [10, 10, 30, 40], '3', { fontSize: 40 })]));
    classifier.score(result);

    const [candidate] = result.getCandidates('bag_number');
    expect(candidate.score).toBeGreaterThan(0.8);
    expect(unwrapBuilt(classifier.build(candidate)).value).toBe(3);
    expect(classifier.winnerGroup(candidate)).toBe('bag:3');
  });

  test('ignores numerals outside the region', () => {
    const result = makeResult(makePage([makeText(1, [150, 200, 170, 230], '3', { fontSize: 40 })]));
    classifier.score(result);
    expect(result.getCandidates('bag_number')).toHaveLength(0);
  });
});

describe('BackgroundClassifier', () => {
  test('a page-sized fill is the background', () => {
    const classifier = new BackgroundClassifier(config);
    const fill = makeDrawing(1, [0, 0, 200, 300], { fillColor: { r: 1, g: 1, b: 1 } });
    const result = makeResult(makePage([fill, makeDrawing(2, [10, 10, 50, 50]), makeText(3, [0, 0, 200, 300], 'x')]));
    classifier.score(result);

    const candidates = result.getCandidates('background');
    expect(candidates.map(c => c.sourceBlocks[0].id)).toEqual([1]);
    expect(candidates[0].score).toBeCloseTo(1, 10);
    expect(unwrapBuilt(classifier.build(candidates[0]))).toEqual({
      kind: 'Background',
      bbox: createBBox(0, 0, 200, 300),
      fillColor: { r: 1, g: 1, b: 1 },
    });
  });
});

describe('ProgressBarClassifier', () => {
  const classifier = new ProgressBarClassifier(config);
  const track = makeDrawing(1, [20, 285, 180, 291]);
  const fill = makeDrawing(2, [20, 285, 100, 291]);

  test('groups the track with its fill and measures progress', () => {
    const result = makeResult(makePage([track, fill]));
    classifier.score(result);

    const candidates = result.getCandidates('progress_bar');
    expect(candidates).toHaveLength(1);
    expect(candidates[0].sourceBlocks.map(b => b.id)).toEqual([1, 2]);
    expect(candidates[0].score).toBeCloseTo(0.95, 10);
    expect(unwrapBuilt(classifier.build(candidates[0]))).toEqual({
      kind: 'ProgressBar',
      bbox: createBBox(20, 285, 180, 291),
      progress: 0.5,
      fullWidth: 160,
    });
  });

  test('a bar next to the page number scores higher', () => {
    const pageNumber = makeText(3, [185, 285, 195, 295], '6');
    const result = makeResult(makePage([track, fill, pageNumber]));
    const winner = result.addCandidate({
      label: 'page_number',
      score: 1,
      scoreDetails: new RuleScore({}, 1),
      sourceBlocks: [pageNumber],
    });
    result.markWinner(winner);
    classifier.score(result);

    expect(result.getCandidates('progress_bar')[0].score).toBe(1);
  });

  test('short or high graphics are not progress bars', () => {
    const result = makeResult(makePage([makeDrawing(1, [20, 150, 180, 156]), makeDrawing(2, [20, 285, 60, 291])]));
    classifier.score(result);
    expect(result.getCandidates('progress_bar')).toHaveLength(0);
  });
});

describe('DividerClassifier', () => {
  const classifier = new DividerClassifier(config);

  test('finds thin lines away from the page edge', () => {
    const vertical = makeDrawing(1, [99, 20, 101, 280], { strokeColor: { r: 1, g: 1, b: 1 } });
    const border = makeDrawing(2, [1, 20, 3, 280], { strokeColor: { r: 1, g: 1, b: 1 } });
    const horizontal = makeDrawing(3, [20, 150, 180, 151], { strokeColor: { r: 0, g: 0, b: 0 } });
    const result = makeResult(makePage([vertical, border, horizontal]));
    classifier.score(result);

    const candidates = result.getCandidates('divider');
    expect(candidates.map(c => c.sourceBlocks[0].id)).toEqual([1, 3]);
    expect(candidates[0].score).toBeCloseTo((0.5 + (0.5 * (260 / 300 - 0.4)) / 0.6) * 0.7 + 0.3, 10);
    expect(candidates.map(c => unwrapBuilt(classifier.build(c)).orientation)).toEqual(['vertical', 'horizontal']);
  });
});
