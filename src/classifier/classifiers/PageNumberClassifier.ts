/**
 * Page Number Classifier
 *
 * Page numbers are short numerals in the bottom band of the page, usually
 * tucked into a bottom corner and equal (or close) to the page's position
 * in the document.
 */

import { Err, Ok } from '../result';
import { isKindFilter } from '../rules/Rule';
import type { Rule } from '../rules/Rule';
import { cornerDistanceRule, inBottomBandFilter } from '../rules/geometryRules';
import { pageNumberTextRule, pageNumberValueRule, targetFontSizeRule } from '../rules/textRules';
import { createLinearScale } from '../rules/scoring';
import { extractPageNumberValue } from '../TextExtractors';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ConstraintModel } from '../ConstraintModel';
import type { BuildResult, Candidate } from '../types';
import { RuleBasedClassifier, soleTextBlock } from './RuleBasedClassifier';
import { constrainWinnerGroups } from './groupConstraints';

/** Used when the document gives no page-number size */
const DEFAULT_PAGE_NUMBER_FONT_SIZE = 12;

export class PageNumberClassifier extends RuleBasedClassifier<'page_number'> {
  readonly name = 'PageNumberClassifier';
  readonly output = 'page_number';
  protected readonly rules: readonly Rule[];
  protected readonly minScore: number;

  constructor(config: ClassifierConfig) {
    super();
    const c = config.pageNumber;
    this.minScore = c.minScore;
    this.rules = [
      isKindFilter('text'),
      inBottomBandFilter(c.bottomBandRatio),
      pageNumberTextRule({ weight: c.textWeight, required: true }),
      cornerDistanceRule(c.positionScale, { weight: c.positionWeight }),
      pageNumberValueRule(createLinearScale([[0, 1], [10, 0]]), { weight: c.pageValueWeight }),
      targetFontSizeRule(ctx => ctx.hints.fontSizes.pageNumberSize ?? DEFAULT_PAGE_NUMBER_FONT_SIZE, {
        weight: c.fontSizeWeight,
      }),
    ];
  }

  build(candidate: Candidate<'page_number'>): BuildResult<'page_number'> {
    const text = soleTextBlock(candidate);
    if (!text.ok) return text;
    const value = extractPageNumberValue(text.value.text);
    if (value === null) return Err(`Could not parse page number from '${text.value.text}'`);
    return Ok({ kind: 'PageNumber', bbox: candidate.bbox, value });
  }

  winnerGroup(): string {
    return 'page_number';
  }

  /** One page number per page */
  declareConstraints(model: ConstraintModel, candidates: readonly Candidate<'page_number'>[]): void {
    constrainWinnerGroups(model, candidates, () => 'page_number');
  }
}
