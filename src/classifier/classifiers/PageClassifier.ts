/**
 * Page Classifier
 *
 * The root of a page's hierarchy. Runs last and always emits exactly one
 * candidate, so a page with no page number or no steps still produces a
 * (partial) Page.
 */

import type { PageCategory, Part } from '../../model/elements';
import { Ok } from '../result';
import { CompositeScore } from '../Score';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy } from '../types';

export class PageClassifier implements LabelClassifier<'page'> {
  readonly name = 'PageClassifier';
  readonly output = 'page';
  readonly requires: ReadonlySet<Label> = new Set<Label>([
    'page_number',
    'progress_bar',
    'background',
    'divider',
    'new_bag',
    'step',
    'part',
    'parts_list',
  ]);
  readonly removal: RemovalPolicy = { removeChildren: false, removeNearDuplicates: false };

  score(result: ClassificationResult): void {
    result.addCandidate({
      label: 'page',
      score: 1,
      scoreDetails: new CompositeScore(),
      sourceBlocks: [],
      bbox: result.pageData.bbox,
    });
  }

  build(candidate: Candidate<'page'>, result: ClassificationResult): BuildResult<'page'> {
    const pageNumber = result.pageData.pageNumber;
    const steps = result.getWinnerElements('step').sort((a, b) => a.stepNumber.value - b.stepNumber.value);

    const categories = new Set<PageCategory>();
    if (steps.length > 0 || result.hints.pages.isInstructionPage(pageNumber)) categories.add('instruction');
    if (result.hints.pages.isCatalogPage(pageNumber)) categories.add('catalog');
    if (categories.size === 0) categories.add('info');

    let catalog: Part[] = [];
    if (categories.has('catalog')) {
      const listed = new Set<Part>(result.getWinnerElements('parts_list').flatMap(list => list.parts));
      catalog = result.getWinnerElements('part').filter(part => !listed.has(part));
    }

    return Ok({
      kind: 'Page',
      bbox: candidate.bbox,
      categories: [...categories].sort(),
      pageNumber: result.getWinnerElements('page_number')[0] ?? null,
      progressBar: result.getWinnerElements('progress_bar')[0] ?? null,
      background: result.getWinnerElements('background')[0] ?? null,
      dividers: result.getWinnerElements('divider'),
      newBags: result.getWinnerElements('new_bag'),
      steps,
      catalog,
    });
  }

  winnerGroup(): string {
    return 'page';
  }
}
