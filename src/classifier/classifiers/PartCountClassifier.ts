/**
 * Part Count Classifier
 *
 * Quantities printed as "2x" under each part in a parts list. Instruction
 * pages and catalog pages use different sizes, so the font-size component
 * takes the better of the two document hints.
 */

import { formatBBox } from '../../model/BBox';
import type { PartCountHint } from '../../model/elements';
import { Err, Ok } from '../result';
import { isKindFilter, maxScoreRule } from '../rules/Rule';
import type { Rule } from '../rules/Rule';
import { effectiveFontSize, fontSizeMatchRule, partCountTextRule } from '../rules/textRules';
import { fontSizeTriangle } from '../rules/scoring';
import { extractPartCountValue } from '../TextExtractors';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ConstraintModel } from '../ConstraintModel';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate } from '../types';
import { RuleBasedClassifier, soleTextBlock } from './RuleBasedClassifier';
import { constrainWinnerGroups } from './groupConstraints';

/** max(0, 1 - 2|size - target| / target), 0 without a target */
function closeness(size: number, target: number | null): number {
  if (target === null || target <= 0) return 0;
  return Math.max(0, 1 - (2 * Math.abs(size - target)) / target);
}

export class PartCountClassifier extends RuleBasedClassifier<'part_count'> {
  readonly name = 'PartCountClassifier';
  readonly output = 'part_count';
  protected readonly rules: readonly Rule[];
  protected readonly minScore: number;

  constructor(config: ClassifierConfig) {
    super();
    const c = config.partCount;
    this.minScore = c.minScore;
    this.rules = [
      isKindFilter('text'),
      partCountTextRule({ weight: c.textWeight, required: true }),
      maxScoreRule(
        [
          fontSizeMatchRule(ctx => fontSizeTriangle(ctx.hints.fontSizes.partCountSize ?? c.defaultFontSize)),
          fontSizeMatchRule(ctx => fontSizeTriangle(ctx.hints.fontSizes.catalogPartCountSize ?? c.defaultFontSize)),
        ],
        { name: 'font_size', weight: c.fontSizeWeight },
      ),
    ];
  }

  build(candidate: Candidate<'part_count'>, result: ClassificationResult): BuildResult<'part_count'> {
    const text = soleTextBlock(candidate);
    if (!text.ok) return text;
    const count = extractPartCountValue(text.value.text);
    if (count === null) return Err(`Could not parse part count from '${text.value.text}'`);

    const size = effectiveFontSize(text.value) ?? 0;
    const { partCountSize, catalogPartCountSize } = result.hints.fontSizes;
    const instruction = closeness(size, partCountSize);
    const catalog = closeness(size, catalogPartCountSize);
    let matchedHint: PartCountHint | null = null;
    if (instruction > 0 || catalog > 0) {
      matchedHint = catalog > instruction ? 'catalog_part_count' : 'part_count';
    }

    return Ok({ kind: 'PartCount', bbox: candidate.bbox, count, matchedHint });
  }

  /** One count per position */
  winnerGroup(candidate: Candidate<'part_count'>): string {
    return formatBBox(candidate.bbox);
  }

  declareConstraints(model: ConstraintModel, candidates: readonly Candidate<'part_count'>[]): void {
    constrainWinnerGroups(model, candidates, c => this.winnerGroup(c));
  }
}
