/**
 * Integration Tests: Document Classifier
 *
 * Duplicate filtering, shared hints and manual assembly across pages.
 */
import { describe, test, expect, vi } from 'vitest';
import { buildManual, classifyPages } from '../DocumentClassifier';
import { makeConfig, makeStackedFramePage, makeStepPage } from '../../test/factories';

const config = makeConfig();

describe('classifyPages', () => {
  test('stacked duplicate blocks are consumed before classification', () => {
    const page = makeStackedFramePage();
    const { results } = classifyPages([page], { config });
    const [result] = results;

    expect(result.getConsumption(page.blocks[2])).toEqual({
      blockId: 3,
      reason: 'duplicate',
      candidateId: null,
      targetBlockId: 4,
    });
    expect(result.getCandidates('parts_list').map(c => c.sourceBlocks[0].id)).toEqual([4]);
    expect(result.page?.steps.map(s => s.stepNumber.value)).toEqual([1, 2]);
  });

  test('results keep input order, the manual is ordered by page number', () => {
    const { results, manual } = classifyPages([makeStepPage(7, 101), makeStepPage(6, 1)], { config });

    expect(results.map(r => r.pageData.pageNumber)).toEqual([7, 6]);
    expect(manual.kind).toBe('Manual');
    expect(manual.pages.map(p => p.pageNumber?.value)).toEqual([6, 7]);
    expect(manual.pages.map(p => p.steps.map(s => s.stepNumber.value))).toEqual([[10], [10]]);
  });

  test('hints come from pagesForHints when given', () => {
    const hintPages = [makeStepPage(6, 1), makeStepPage(7, 101), makeStepPage(8, 201)];
    const { results, hints } = classifyPages([makeStepPage(9, 301)], { config, pagesForHints: hintPages });

    expect(results).toHaveLength(1);
    expect(hints.pages.size).toBe(3);
    expect(hints.pages.getHint(9)).toBeNull();
    expect(hints.fontSizes.partCountSize).toBe(10);
  });

  test('debug mode reports warnings per page', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    classifyPages([makeStackedFramePage()], { config: makeConfig({ debug: true }) });

    expect(log).toHaveBeenCalledWith('[DocumentClassifier] Page 1: 1 warning(s)');
    log.mockRestore();
  });
});

describe('buildManual', () => {
  test('an empty document is an empty manual', () => {
    expect(buildManual([])).toEqual({ kind: 'Manual', pages: [] });
  });
});
