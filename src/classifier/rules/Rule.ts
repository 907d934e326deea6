/**
 * Rule Engine: Core
 *
 * A Rule scores one block against the page context and returns either a
 * value in [0, 1] or null ("not applicable"). Rules marked `required` act as
 * hard gates: a 0 from a required rule disqualifies the block outright.
 * Everything else is folded into a weighted mean over the rules that
 * actually returned a value, so a missing hint drops out of the total
 * instead of dragging the score to zero.
 */

import type { Block, BlockKind } from '../../model/types';
import type { RuleContext } from '../types';
import { RuleScore } from '../Score';

export interface Rule {
  readonly name: string;
  readonly weight: number;
  readonly required: boolean;
  calculate(block: Block, ctx: RuleContext): number | null;
}

export interface RuleOptions {
  name?: string;
  weight?: number;
  required?: boolean;
}

/**
 * Evaluate `rules` against `block`.
 * Returns null when a required rule scored 0, otherwise the combined score
 * with a per-rule breakdown.
 */
export function evaluateRules(block: Block, rules: readonly Rule[], ctx: RuleContext): RuleScore | null {
  const components: Record<string, number> = {};
  let weightedSum = 0;
  let totalWeight = 0;

  for (const rule of rules) {
    const score = rule.calculate(block, ctx);
    if (score === null) continue;
    if (rule.required && score === 0) return null;

    components[rule.name] = score;
    weightedSum += score * rule.weight;
    totalWeight += rule.weight;
  }

  const total = totalWeight > 0 ? weightedSum / totalWeight : 0;
  return new RuleScore(components, total);
}

// ─── Filters ─────────────────────────────────────────────────

/** Gate on block kind: 1 for a match, 0 otherwise. */
export function isKindFilter(kind: BlockKind, name = `is_${kind}`): Rule {
  return {
    name,
    weight: 0,
    required: true,
    calculate: block => (block.kind === kind ? 1 : 0),
  };
}

// ─── Combinators ─────────────────────────────────────────────

/**
 * Maximum over sub-rules that returned a value; null when none did.
 * Sub-rule weights and required flags are ignored.
 */
export function maxScoreRule(rules: readonly Rule[], options: RuleOptions = {}): Rule {
  return {
    name: options.name ?? 'max_score',
    weight: options.weight ?? 1,
    required: options.required ?? false,
    calculate(block, ctx) {
      let best: number | null = null;
      for (const rule of rules) {
        const score = rule.calculate(block, ctx);
        if (score !== null && (best === null || score > best)) best = score;
      }
      return best;
    },
  };
}
