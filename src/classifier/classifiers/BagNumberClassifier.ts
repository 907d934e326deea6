/**
 * Bag Number Classifier
 *
 * The numeral on a "new bag" callout: a one or two digit number in the
 * top-left of the page, printed larger than step numbers.
 */

import { Err, Ok } from '../result';
import { isKindFilter } from '../rules/Rule';
import type { Rule } from '../rules/Rule';
import { inTopLeftRegionFilter, topLeftPositionRule } from '../rules/geometryRules';
import { bagNumberTextRule, largerFontRule } from '../rules/textRules';
import { extractBagNumberValue } from '../TextExtractors';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ConstraintModel } from '../ConstraintModel';
import type { BuildResult, Candidate } from '../types';
import { RuleBasedClassifier, soleTextBlock } from './RuleBasedClassifier';
import { constrainWinnerGroups } from './groupConstraints';

export class BagNumberClassifier extends RuleBasedClassifier<'bag_number'> {
  readonly name = 'BagNumberClassifier';
  readonly output = 'bag_number';
  protected readonly rules: readonly Rule[];
  protected readonly minScore: number;

  constructor(config: ClassifierConfig) {
    super();
    const c = config.bagNumber;
    this.minScore = c.minScore;
    this.rules = [
      isKindFilter('text'),
      inTopLeftRegionFilter(c.topLeftRatio),
      bagNumberTextRule({ weight: c.textWeight, required: true }),
      topLeftPositionRule({ weight: c.positionWeight }),
      largerFontRule(ctx => ctx.hints.fontSizes.stepNumberSize, { weight: c.fontSizeWeight }),
    ];
  }

  build(candidate: Candidate<'bag_number'>): BuildResult<'bag_number'> {
    const text = soleTextBlock(candidate);
    if (!text.ok) return text;
    const value = extractBagNumberValue(text.value.text);
    if (value === null) return Err(`Could not parse bag number from '${text.value.text}'`);
    return Ok({ kind: 'BagNumber', bbox: candidate.bbox, value });
  }

  winnerGroup(candidate: Candidate<'bag_number'>): string | null {
    const text = soleTextBlock(candidate);
    if (!text.ok) return null;
    const value = extractBagNumberValue(text.value.text);
    return value === null ? null : `bag:${value}`;
  }

  declareConstraints(model: ConstraintModel, candidates: readonly Candidate<'bag_number'>[]): void {
    constrainWinnerGroups(model, candidates, c => this.winnerGroup(c));
  }
}
