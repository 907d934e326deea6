/**
 * Rule-Based Classifier Base
 *
 * Scores every unconsumed block of the page against a fixed rule list and
 * emits one single-block candidate per block that clears `minScore`.
 * Subclasses supply the rules, the threshold and `build`.
 */

import type { Block, TextBlock } from '../../model/types';
import { Err, Ok } from '../result';
import type { Result } from '../result';
import { evaluateRules } from '../rules/Rule';
import type { Rule } from '../rules/Rule';
import type { ClassificationResult } from '../ClassificationResult';
import type {
  BuildResult,
  Candidate,
  Label,
  LabelClassifier,
  RemovalPolicy,
  RuleContext,
} from '../types';

export const DEFAULT_REMOVAL: RemovalPolicy = { removeChildren: true, removeNearDuplicates: true };

export abstract class RuleBasedClassifier<L extends Label> implements LabelClassifier<L> {
  abstract readonly name: string;
  abstract readonly output: L;
  readonly requires: ReadonlySet<Label> = new Set<Label>();
  readonly removal: RemovalPolicy = DEFAULT_REMOVAL;

  protected abstract readonly rules: readonly Rule[];
  protected abstract readonly minScore: number;

  score(result: ClassificationResult): void {
    const ctx: RuleContext = { pageData: result.pageData, hints: result.hints };
    for (const block of result.unconsumedBlocks()) {
      const details = evaluateRules(block, this.rules, ctx);
      if (details === null || details.totalScore < this.minScore) continue;
      result.addCandidate({
        label: this.output,
        score: details.totalScore,
        scoreDetails: details,
        sourceBlocks: [block],
      });
    }
  }

  abstract build(candidate: Candidate<L>, result: ClassificationResult): BuildResult<L>;
}

/** The single text block behind a text candidate */
export function soleTextBlock(candidate: Candidate): Result<TextBlock, string> {
  const block: Block | undefined = candidate.sourceBlocks[0];
  if (candidate.sourceBlocks.length !== 1 || block === undefined || block.kind !== 'text') {
    return Err(`Expected a single text block, got ${candidate.sourceBlocks.length} block(s)`);
  }
  return Ok(block);
}
