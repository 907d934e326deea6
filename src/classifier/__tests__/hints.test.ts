/**
 * Unit Tests: Document Hints
 *
 * Text histograms, font-size hints and page-type guesses computed once per
 * document.
 */
import { describe, test, expect, vi } from 'vitest';
import type { Block } from '../../model/types';
import { computeFontSizeHints } from '../hints/FontSizeHints';
import { PageHints, computePageHint, mostLikelyCategory } from '../hints/PageHints';
import { buildTextHistogram, mostCommon } from '../hints/TextHistogram';
import { buildClassifierHints, emptyHints } from '../hints';
import { makePage, makeText } from '../../test/factories';

let nextId = 0;

function texts(text: string, fontSize: number, times = 1): Block[] {
  return Array.from({ length: times }, (_, i) =>
    makeText(nextId++, [10 + 20 * i, 10, 20 + 20 * i, 20], text, { fontSize, fontName: 'Sans' }),
  );
}

// Pages 1-3 are instruction pages, page 4 is a catalog page
function makeDocument() {
  return [
    makePage([...texts('1', 10), ...texts('2x', 8, 2), ...texts('3x', 14)], 1),
    makePage([...texts('2', 10), ...texts('2x', 8, 2), ...texts('3x', 14, 2)], 2),
    makePage([...texts('3', 10)], 3),
    makePage([...texts('4', 10), ...texts('6012345', 7, 4), ...texts('2x', 6, 3)], 4),
  ];
}

describe('buildTextHistogram', () => {
  test('sorts numeric text into families by shape and value', () => {
    const page = makePage(
      [
        ...texts('2x', 8, 3),
        ...texts('5', 12),
        ...texts('6012345', 6),
        ...texts('12', 20),
        ...texts('1234', 9),
        ...texts('Open the bag', 9),
      ],
      5,
    );
    const histogram = buildTextHistogram([page]);

    expect(histogram.partCountFontSizes).toEqual(new Map([[8, 3]]));
    expect(histogram.pageNumberFontSizes).toEqual(new Map([[12, 1]]));
    expect(histogram.elementIdFontSizes).toEqual(new Map([[6, 1]]));
    expect(histogram.stepNumberFontSizes).toEqual(new Map([[20, 1]]));
    expect(histogram.remainingFontSizes).toEqual(new Map([[9, 1]]));
    expect(histogram.fontNameCounts).toEqual(new Map([['Sans', 8]]));
  });

  test('mostCommon keeps first-seen order for equal counts', () => {
    expect(mostCommon(new Map([[3, 1], [7, 2], [5, 2]]))).toEqual([[7, 2], [5, 2], [3, 1]]);
    expect(mostCommon(new Map([[3, 1], [7, 2]]), 1)).toEqual([[7, 2]]);
  });
});

describe('computeFontSizeHints', () => {
  test('separates instruction and catalog sizes', () => {
    const hints = computeFontSizeHints(makeDocument());

    expect(hints.partCountSize).toBe(8);
    expect(hints.stepNumberSize).toBe(14);
    expect(hints.stepRepeatSize).toBeNull();
    expect(hints.catalogPartCountSize).toBe(6);
    expect(hints.catalogElementIdSize).toBe(7);
    expect(hints.pageNumberSize).toBe(10);
  });

  test('sizes seen fewer than three times are not trusted', () => {
    const hints = computeFontSizeHints([makePage(texts('2x', 8, 2), 1)]);
    expect(hints.partCountSize).toBeNull();
  });

  test('an empty document gives no hints', () => {
    expect(computeFontSizeHints([])).toEqual(emptyHints().fontSizes);
  });

  test('warns when catalog counts are printed larger than instruction counts', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    computeFontSizeHints([
      makePage(texts('2x', 8, 3), 1),
      makePage([...texts('6012345', 7, 4), ...texts('2x', 12, 3)], 2),
    ]);
    expect(warn).toHaveBeenCalledWith(
      '[FontSizeHints] Catalog part count size (12) is larger than instruction part count size (8)',
    );
    warn.mockRestore();
  });
});

describe('PageHints', () => {
  test('a page of element ids is a catalog page', () => {
    const hint = computePageHint(makeDocument()[3]);
    expect(hint.partNumberCount).toBe(4);
    expect(hint.confidences.catalog).toBeCloseTo(0.64, 10);
    expect(mostLikelyCategory(hint)).toBe('catalog');
  });

  test('counts in two sizes make an instruction page', () => {
    const hint = computePageHint(makeDocument()[1]);
    expect(hint.stepNumberCount).toBe(2);
    expect(hint.confidences.instruction).toBe(0.9);
  });

  test('a page without numbers is an info page', () => {
    const hint = computePageHint(makePage(texts('Welcome', 20), 9));
    expect(hint.confidences).toEqual({ instruction: 0, catalog: 0, info: 0.8 });
  });

  test('lookups by page number', () => {
    const hints = PageHints.fromPages(makeDocument());
    expect(hints.size).toBe(4);
    expect(hints.isCatalogPage(4)).toBe(true);
    expect(hints.isConfidently(4, 'catalog')).toBe(false);
    expect(hints.isInstructionPage(2)).toBe(true);
    expect(hints.isConfidently(2, 'instruction')).toBe(true);
    expect(hints.getHint(99)).toBeNull();
    expect(hints.isInstructionPage(99)).toBe(false);
  });

  test('buildClassifierHints combines both kinds', () => {
    const hints = buildClassifierHints(makeDocument());
    expect(hints.fontSizes.partCountSize).toBe(8);
    expect(hints.pages.isCatalogPage(4)).toBe(true);
  });
});
