/**
 * Text Histogram
 *
 * Document-wide counts of font names and of the font sizes used by each
 * family of numeric text (part counts, page numbers, element ids, step-like
 * numbers). Classifiers never read it directly; it feeds FontSizeHints and
 * PageHints.
 */

import type { PageData } from '../../model/types';
import { extractPartCountValue } from '../TextExtractors';

/** Value -> occurrence count, iterated in first-seen order */
export type Counter<K> = Map<K, number>;

export interface TextHistogram {
  fontNameCounts: Counter<string>;
  partCountFontSizes: Counter<number>;
  /** Integers 1-999 that are not the page number */
  stepNumberFontSizes: Counter<number>;
  /** Integers within 1 of the page's own number */
  pageNumberFontSizes: Counter<number>;
  /** 6-7 digit integers */
  elementIdFontSizes: Counter<number>;
  /** Every other integer */
  remainingFontSizes: Counter<number>;
}

const DIGITS_ONLY = /^\d+$/;

export function emptyTextHistogram(): TextHistogram {
  return {
    fontNameCounts: new Map(),
    partCountFontSizes: new Map(),
    stepNumberFontSizes: new Map(),
    pageNumberFontSizes: new Map(),
    elementIdFontSizes: new Map(),
    remainingFontSizes: new Map(),
  };
}

export function increment<K>(counter: Counter<K>, key: K, by = 1): void {
  counter.set(key, (counter.get(key) ?? 0) + by);
}

export function counterTotal<K>(counter: Counter<K>): number {
  let total = 0;
  for (const count of counter.values()) total += count;
  return total;
}

/** Entries by count descending; equal counts keep first-seen order. */
export function mostCommon<K>(counter: Counter<K>, limit?: number): Array<[K, number]> {
  const sorted = [...counter.entries()].sort((a, b) => b[1] - a[1]);
  return limit === undefined ? sorted : sorted.slice(0, limit);
}

/** Adds every count of `other` into `target`. */
export function mergeTextHistogram(target: TextHistogram, other: TextHistogram): void {
  for (const [name, count] of other.fontNameCounts) increment(target.fontNameCounts, name, count);
  for (const [size, count] of other.partCountFontSizes) increment(target.partCountFontSizes, size, count);
  for (const [size, count] of other.stepNumberFontSizes) increment(target.stepNumberFontSizes, size, count);
  for (const [size, count] of other.pageNumberFontSizes) increment(target.pageNumberFontSizes, size, count);
  for (const [size, count] of other.elementIdFontSizes) increment(target.elementIdFontSizes, size, count);
  for (const [size, count] of other.remainingFontSizes) increment(target.remainingFontSizes, size, count);
}

export function buildTextHistogram(pages: readonly PageData[]): TextHistogram {
  const histogram = emptyTextHistogram();

  for (const page of pages) {
    for (const block of page.blocks) {
      if (block.kind !== 'text') continue;
      if (block.fontName !== null) increment(histogram.fontNameCounts, block.fontName);
      if (block.fontSize === null) continue;

      const text = block.text.trim();
      const size = block.fontSize;

      if (extractPartCountValue(text) !== null) {
        increment(histogram.partCountFontSizes, size);
        continue;
      }
      if (!DIGITS_ONLY.test(text)) continue;

      const value = Number.parseInt(text, 10);
      if (text.length >= 6 && text.length <= 7) {
        increment(histogram.elementIdFontSizes, size);
      } else if (Math.abs(value - page.pageNumber) <= 1) {
        increment(histogram.pageNumberFontSizes, size);
      } else if (value >= 1 && value <= 999) {
        increment(histogram.stepNumberFontSizes, size);
      } else {
        increment(histogram.remainingFontSizes, size);
      }
    }
  }

  return histogram;
}
