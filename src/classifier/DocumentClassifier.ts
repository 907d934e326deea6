/**
 * Document Classifier
 *
 * Whole-document entry point: removes stacked duplicate blocks, computes
 * the document hints once, then classifies every page with the same
 * pipeline and collects the pages into a Manual.
 */

import type { Manual, Page } from '../model/elements';
import type { PageData } from '../model/types';
import { filterDuplicateBlocks } from './BlockFilter';
import { ClassificationPipeline } from './ClassificationPipeline';
import type { ClassificationResult } from './ClassificationResult';
import { defaultClassifierConfig } from './ClassifierConfig';
import type { ClassifierConfig } from './ClassifierConfig';
import { createDefaultClassifiers } from './classifiers';
import { buildClassifierHints } from './hints';
import type { ClassifierHints, LabelClassifier } from './types';

export interface ClassifyPagesOptions {
  config?: ClassifierConfig;
  /** Pages to compute the document hints from; defaults to the pages being classified */
  pagesForHints?: readonly PageData[];
  /** Replaces the default classifier set */
  classifiers?: readonly LabelClassifier[];
}

export interface DocumentClassification {
  /** One result per input page, in input order */
  results: ClassificationResult[];
  hints: ClassifierHints;
  manual: Manual;
}

function withoutDuplicates(page: PageData, threshold: number): PageData {
  return { ...page, blocks: filterDuplicateBlocks(page.blocks, threshold).kept };
}

export function classifyPages(
  pages: readonly PageData[],
  options: ClassifyPagesOptions = {},
): DocumentClassification {
  const config = options.config ?? defaultClassifierConfig();
  const pipeline = new ClassificationPipeline(options.classifiers ?? createDefaultClassifiers(config), config);
  const threshold = config.duplicateIouThreshold;

  const duplicates = pages.map(page => filterDuplicateBlocks(page.blocks, threshold).removed);
  const hints = buildClassifierHints((options.pagesForHints ?? pages).map(page => withoutDuplicates(page, threshold)));

  const results = pages.map((page, i) => {
    const result = pipeline.classify(page, hints, duplicates[i]);
    if (config.debug) {
      console.log(`[DocumentClassifier] Page ${page.pageNumber}: ${result.warnings.length} warning(s)`);
    }
    return result;
  });

  return { results, hints, manual: buildManual(results) };
}

/** Collect the assembled pages, ordered by page number */
export function buildManual(results: readonly ClassificationResult[]): Manual {
  const pages = [...results]
    .sort((a, b) => a.pageData.pageNumber - b.pageData.pageNumber)
    .map(result => result.page)
    .filter((page): page is Page => page !== null);
  return { kind: 'Manual', pages };
}
