import type { ConstraintModel } from '../ConstraintModel';
import type { Candidate } from '../types';

/** At most one selected candidate per winner-group key; null keys are unconstrained. */
export function constrainWinnerGroups<C extends Candidate>(
  model: ConstraintModel,
  candidates: readonly C[],
  groupOf: (candidate: C) => string | null,
): void {
  const groups = new Map<string, C[]>();
  for (const candidate of candidates) {
    const key = groupOf(candidate);
    if (key === null) continue;
    const list = groups.get(key) ?? [];
    list.push(candidate);
    groups.set(key, list);
  }
  for (const list of groups.values()) model.atMostOneOf(list);
}
