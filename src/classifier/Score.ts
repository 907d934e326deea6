import type { Score } from './types';

/** Result of evaluating a rule list against one block */
export class RuleScore implements Score {
  constructor(
    /** Per-rule scores keyed by rule name; rules that returned "not applicable" are absent */
    readonly components: Readonly<Record<string, number>>,
    readonly totalScore: number,
  ) {}

  score(): number {
    return this.totalScore;
  }
}

/** Fixed score for candidates synthesized from already-selected elements */
export class CompositeScore implements Score {
  constructor(readonly value = 1) {}

  score(): number {
    return this.value;
  }
}
