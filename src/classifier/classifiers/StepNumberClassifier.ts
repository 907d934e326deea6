/**
 * Step Number Classifier
 *
 * Large bare integers outside the page-number band. Numerals printed inside
 * an image belong to the artwork and are gated out, unless the image is the
 * page background.
 */

import { Err, Ok } from '../result';
import { isKindFilter } from '../rules/Rule';
import type { Rule } from '../rules/Rule';
import { inBottomBandFilter, outsideImagesFilter } from '../rules/geometryRules';
import { stepNumberTextRule, targetFontSizeRule } from '../rules/textRules';
import { extractStepNumberValue } from '../TextExtractors';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ConstraintModel } from '../ConstraintModel';
import type { BuildResult, Candidate } from '../types';
import { RuleBasedClassifier, soleTextBlock } from './RuleBasedClassifier';
import { constrainWinnerGroups } from './groupConstraints';

export class StepNumberClassifier extends RuleBasedClassifier<'step_number'> {
  readonly name = 'StepNumberClassifier';
  readonly output = 'step_number';
  protected readonly rules: readonly Rule[];
  protected readonly minScore: number;

  constructor(config: ClassifierConfig) {
    super();
    const c = config.stepNumber;
    this.minScore = c.minScore;
    this.rules = [
      isKindFilter('text'),
      inBottomBandFilter(config.pageNumber.bottomBandRatio, true),
      outsideImagesFilter(config.background.minCoverageRatio),
      stepNumberTextRule({ weight: c.textWeight, required: true }),
      targetFontSizeRule(ctx => ctx.hints.fontSizes.stepNumberSize, { weight: c.fontSizeWeight }),
    ];
  }

  build(candidate: Candidate<'step_number'>): BuildResult<'step_number'> {
    const text = soleTextBlock(candidate);
    if (!text.ok) return text;
    const value = extractStepNumberValue(text.value.text);
    if (value === null) return Err(`Could not parse step number from '${text.value.text}'`);
    return Ok({ kind: 'StepNumber', bbox: candidate.bbox, value });
  }

  /** One winner per printed value */
  winnerGroup(candidate: Candidate<'step_number'>): string | null {
    const text = soleTextBlock(candidate);
    if (!text.ok) return null;
    const value = extractStepNumberValue(text.value.text);
    return value === null ? null : `step:${value}`;
  }

  declareConstraints(model: ConstraintModel, candidates: readonly Candidate<'step_number'>[]): void {
    constrainWinnerGroups(model, candidates, c => this.winnerGroup(c));
  }
}
