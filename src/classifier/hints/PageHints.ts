/**
 * Page Hints
 *
 * A cheap pre-pass that guesses each page's type from how many part counts,
 * element ids and step-sized numbers it carries.
 */

import type { PageCategory } from '../../model/elements';
import type { PageData } from '../../model/types';
import { buildTextHistogram, counterTotal, mostCommon } from './TextHistogram';
import { CATALOG_ELEMENT_ID_THRESHOLD } from './FontSizeHints';

/** Confidence above which a page counts as a given type */
const TYPE_CONFIDENCE_THRESHOLD = 0.8;

export interface PageHint {
  pageNumber: number;
  confidences: Readonly<Record<PageCategory, number>>;
  partNumberCount: number;
  partCountCount: number;
  stepNumberCount: number;
}

/** Category with the highest confidence; ties resolve in instruction, catalog, info order. */
export function mostLikelyCategory(hint: PageHint): PageCategory {
  const order: PageCategory[] = ['instruction', 'catalog', 'info'];
  let best = order[0];
  for (const category of order) {
    if (hint.confidences[category] > hint.confidences[best]) best = category;
  }
  return best;
}

export function computePageHint(page: PageData): PageHint {
  const histogram = buildTextHistogram([page]);
  const partNumberCount = counterTotal(histogram.elementIdFontSizes);
  const partCountCount = counterTotal(histogram.partCountFontSizes);

  // Step numbers share the part-count font family; the runner-up size is
  // taken as steps when it occurs only a handful of times.
  let stepNumberCount = 0;
  if (partCountCount > 0) {
    const top = mostCommon(histogram.partCountFontSizes, 3);
    if (top.length >= 2 && top[1][1] >= 1 && top[1][1] <= 5) {
      stepNumberCount = top[1][1];
    }
  }

  let catalog = 0;
  if (partNumberCount > CATALOG_ELEMENT_ID_THRESHOLD) {
    catalog = Math.min(0.95, 0.6 + partNumberCount / 100);
  } else if (partNumberCount > 0) {
    catalog = Math.min(0.5, 0.2 + partNumberCount / 50);
  }

  let instruction = 0;
  if (stepNumberCount > 0 && partCountCount > 0) {
    instruction = 0.9;
  } else if (stepNumberCount > 0) {
    instruction = 0.8;
  } else if (partCountCount > 5 && partNumberCount < 10) {
    instruction = 0.7;
  } else if (partCountCount > 0 && partNumberCount === 0) {
    instruction = 0.6;
  }

  let info = 0;
  if (partCountCount === 0 && partNumberCount === 0) {
    info = 0.8;
  } else if (partCountCount < 3 && partNumberCount < 3) {
    info = 0.5;
  }

  return {
    pageNumber: page.pageNumber,
    confidences: { instruction, catalog, info },
    partNumberCount,
    partCountCount,
    stepNumberCount,
  };
}

export class PageHints {
  private constructor(private readonly hints: ReadonlyMap<number, PageHint>) {}

  static empty(): PageHints {
    return new PageHints(new Map());
  }

  static fromPages(pages: readonly PageData[]): PageHints {
    const hints = new Map<number, PageHint>();
    for (const page of pages) {
      hints.set(page.pageNumber, computePageHint(page));
    }
    return new PageHints(hints);
  }

  get size(): number {
    return this.hints.size;
  }

  getHint(pageNumber: number): PageHint | null {
    return this.hints.get(pageNumber) ?? null;
  }

  /** Most likely type is catalog with confidence >= 0.5 */
  isCatalogPage(pageNumber: number): boolean {
    return this.isLikely(pageNumber, 'catalog');
  }

  isInstructionPage(pageNumber: number): boolean {
    return this.isLikely(pageNumber, 'instruction');
  }

  /** Confidence for `category` above 0.8 */
  isConfidently(pageNumber: number, category: PageCategory): boolean {
    const hint = this.getHint(pageNumber);
    return hint !== null && hint.confidences[category] > TYPE_CONFIDENCE_THRESHOLD;
  }

  private isLikely(pageNumber: number, category: PageCategory): boolean {
    const hint = this.getHint(pageNumber);
    if (hint === null) return false;
    return mostLikelyCategory(hint) === category && hint.confidences[category] >= 0.5;
  }
}
