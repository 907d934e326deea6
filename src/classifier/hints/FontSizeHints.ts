/**
 * Font Size Hints
 *
 * The most common font size for each family of numeric text in a document.
 * Pages with more than CATALOG_ELEMENT_ID_THRESHOLD element ids are treated
 * as catalog pages and their part counts are tallied separately, since
 * catalogs print counts smaller than build steps do.
 */

import type { PageData } from '../../model/types';
import type { Counter, TextHistogram } from './TextHistogram';
import { buildTextHistogram, counterTotal, emptyTextHistogram, mergeTextHistogram, mostCommon } from './TextHistogram';

// ─── Constants ───────────────────────────────────────────────

/** Fewer occurrences than this and a size is not trusted */
const MIN_SAMPLES = 3;

/** Element id count above which a page is a catalog page */
export const CATALOG_ELEMENT_ID_THRESHOLD = 3;

// ─── Types ───────────────────────────────────────────────────

export interface FontSizeHints {
  /** Part counts ("2x") on instruction pages */
  partCountSize: number | null;
  /** Part counts on catalog pages */
  catalogPartCountSize: number | null;
  catalogElementIdSize: number | null;
  /** Second most common part-count-shaped size on instruction pages */
  stepNumberSize: number | null;
  stepRepeatSize: number | null;
  pageNumberSize: number | null;
  remainingFontSizes: ReadonlyMap<number, number>;
}

export function emptyFontSizeHints(): FontSizeHints {
  return {
    partCountSize: null,
    catalogPartCountSize: null,
    catalogElementIdSize: null,
    stepNumberSize: null,
    stepRepeatSize: null,
    pageNumberSize: null,
    remainingFontSizes: new Map(),
  };
}

// ─── Extraction ──────────────────────────────────────────────

function nthSizeWithMinimum(top: Array<[number, number]>, n: number): number | null {
  if (top.length <= n) return null;
  const [size, count] = top[n];
  return count >= MIN_SAMPLES ? size : null;
}

function sizeWithMinimum(counter: Counter<number>): number | null {
  return nthSizeWithMinimum(mostCommon(counter, 1), 0);
}

export function computeFontSizeHints(pages: readonly PageData[]): FontSizeHints {
  if (pages.length === 0) return emptyFontSizeHints();

  const instruction: TextHistogram = emptyTextHistogram();
  const catalog: TextHistogram = emptyTextHistogram();
  const all: TextHistogram = emptyTextHistogram();
  let instructionPages = 0;
  let catalogPages = 0;

  for (const page of pages) {
    const pageHistogram = buildTextHistogram([page]);
    mergeTextHistogram(all, pageHistogram);
    if (counterTotal(pageHistogram.elementIdFontSizes) > CATALOG_ELEMENT_ID_THRESHOLD) {
      mergeTextHistogram(catalog, pageHistogram);
      catalogPages++;
    } else {
      mergeTextHistogram(instruction, pageHistogram);
      instructionPages++;
    }
  }

  let partCountSize: number | null = null;
  let stepNumberSize: number | null = null;
  let stepRepeatSize: number | null = null;
  if (instructionPages > 0) {
    const top = mostCommon(instruction.partCountFontSizes, 4);
    partCountSize = nthSizeWithMinimum(top, 0);
    stepNumberSize = nthSizeWithMinimum(top, 1);
    stepRepeatSize = nthSizeWithMinimum(top, 2);
  }

  let catalogPartCountSize: number | null = null;
  let catalogElementIdSize: number | null = null;
  if (catalogPages > 0) {
    catalogPartCountSize = sizeWithMinimum(catalog.partCountFontSizes);
    catalogElementIdSize = sizeWithMinimum(catalog.elementIdFontSizes);
    if (catalogPartCountSize !== null && partCountSize !== null && catalogPartCountSize > partCountSize) {
      console.warn(
        `[FontSizeHints] Catalog part count size (${catalogPartCountSize}) is larger than ` +
        `instruction part count size (${partCountSize})`,
      );
    }
  }

  return {
    partCountSize,
    catalogPartCountSize,
    catalogElementIdSize,
    stepNumberSize,
    stepRepeatSize,
    pageNumberSize: sizeWithMinimum(all.pageNumberFontSizes),
    remainingFontSizes: new Map(all.remainingFontSizes),
  };
}
