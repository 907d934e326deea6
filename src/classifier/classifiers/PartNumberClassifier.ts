/**
 * Part Number Classifier
 *
 * Catalog element ids: 4-8 digit numbers printed under a part. Seven-digit
 * ids are by far the most common, which the text rule rewards.
 */

import { formatBBox } from '../../model/BBox';
import { Err, Ok } from '../result';
import { isKindFilter } from '../rules/Rule';
import type { Rule } from '../rules/Rule';
import { partNumberTextRule, targetFontSizeRule } from '../rules/textRules';
import { extractElementId } from '../TextExtractors';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ConstraintModel } from '../ConstraintModel';
import type { BuildResult, Candidate } from '../types';
import { RuleBasedClassifier, soleTextBlock } from './RuleBasedClassifier';
import { constrainWinnerGroups } from './groupConstraints';

export class PartNumberClassifier extends RuleBasedClassifier<'part_number'> {
  readonly name = 'PartNumberClassifier';
  readonly output = 'part_number';
  protected readonly rules: readonly Rule[];
  protected readonly minScore: number;

  constructor(config: ClassifierConfig) {
    super();
    const c = config.partNumber;
    this.minScore = c.minScore;
    this.rules = [
      isKindFilter('text'),
      partNumberTextRule({ weight: c.textWeight, required: true }),
      targetFontSizeRule(ctx => ctx.hints.fontSizes.catalogElementIdSize, { weight: c.fontSizeWeight }),
    ];
  }

  build(candidate: Candidate<'part_number'>): BuildResult<'part_number'> {
    const text = soleTextBlock(candidate);
    if (!text.ok) return text;
    const elementId = extractElementId(text.value.text);
    if (elementId === null) return Err(`'${text.value.text}' is not an element id`);
    return Ok({ kind: 'PartNumber', bbox: candidate.bbox, elementId });
  }

  winnerGroup(candidate: Candidate<'part_number'>): string {
    return formatBBox(candidate.bbox);
  }

  declareConstraints(model: ConstraintModel, candidates: readonly Candidate<'part_number'>[]): void {
    constrainWinnerGroups(model, candidates, c => this.winnerGroup(c));
  }
}
