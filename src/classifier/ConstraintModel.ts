/**
 * Constraint Model: Page-Wide Candidate Selection
 *
 * A small 0/1 optimisation model: one boolean per candidate, an integer
 * weight per boolean, and a handful of selection constraints. `solve`
 * maximises the total weight of the selected candidates.
 *
 * The solver is an exact branch and bound run separately on each connected
 * component of the constraint graph, each with its own node budget.
 * Variables are branched in a fixed
 * order (weight descending, candidate id ascending) with "select" tried
 * before "skip", so equal-objective solutions always resolve the same way.
 */

import type { Candidate, Label } from './types';

// ─── Types ───────────────────────────────────────────────────

type Constraint =
  | { kind: 'at-most-one'; vars: number[] }
  | { kind: 'exactly-one'; vars: number[] }
  | { kind: 'implies'; antecedent: number; consequent: number }
  | { kind: 'any-then-one-of'; triggers: number[]; targets: number[] };

export interface SolveResult {
  /** No component was proven infeasible */
  success: boolean;
  /** Ids of the selected candidates */
  selected: Set<number>;
  /** Sum of the selected integer weights */
  objective: number;
  /** The node limit cut some search short; the selection may not be optimal */
  exhausted: boolean;
  /**
   * Variables of components left without any assignment, either proven
   * infeasible or cut short before a first feasible one was found
   */
  unresolved: Set<number>;
}

/** Weights are stored as integers at this scale */
const WEIGHT_SCALE = 1000;

const UNASSIGNED = -1;

// ─── Model ───────────────────────────────────────────────────

export class ConstraintModel {
  private readonly candidates = new Map<number, Candidate>();
  private readonly weights = new Map<number, number>();
  private readonly constraints: Constraint[] = [];

  /** Add a decision variable; the weight defaults to the candidate's score. */
  addCandidate(candidate: Candidate, weight: number = candidate.score): void {
    this.candidates.set(candidate.id, candidate);
    this.weights.set(candidate.id, Math.round(weight * WEIGHT_SCALE));
  }

  hasCandidate(candidate: Candidate): boolean {
    return this.candidates.has(candidate.id);
  }

  get size(): number {
    return this.candidates.size;
  }

  atMostOneOf(candidates: readonly Candidate[]): void {
    if (candidates.length <= 1) return;
    this.constraints.push({ kind: 'at-most-one', vars: this.ids(candidates) });
  }

  exactlyOneOf(candidates: readonly Candidate[]): void {
    this.constraints.push({ kind: 'exactly-one', vars: this.ids(candidates) });
  }

  /** Selecting `antecedent` forces `consequent` */
  ifSelectedThen(antecedent: Candidate, consequent: Candidate): void {
    const [a, c] = this.ids([antecedent, consequent]);
    this.constraints.push({ kind: 'implies', antecedent: a, consequent: c });
  }

  /** If any trigger is selected, at least one target must be */
  ifAnySelectedThenOneOf(triggers: readonly Candidate[], targets: readonly Candidate[]): void {
    if (triggers.length === 0) return;
    this.constraints.push({ kind: 'any-then-one-of', triggers: this.ids(triggers), targets: this.ids(targets) });
  }

  mutuallyExclusive(a: Candidate, b: Candidate): void {
    this.atMostOneOf([a, b]);
  }

  /** At most one selected candidate per source block */
  addBlockExclusivityConstraints(): void {
    const byBlock = new Map<number, Candidate[]>();
    for (const candidate of this.candidates.values()) {
      for (const block of candidate.sourceBlocks) {
        const list = byBlock.get(block.id) ?? [];
        list.push(candidate);
        byBlock.set(block.id, list);
      }
    }
    for (const [, list] of [...byBlock.entries()].sort((a, b) => a[0] - b[0])) {
      this.atMostOneOf(list);
    }
  }

  getCandidatesByLabel<L extends Label>(label: L): Candidate[] {
    return [...this.candidates.values()].filter(c => c.label === label);
  }

  getConstraintSummary(): Record<string, number> {
    const summary: Record<string, number> = { variables: this.candidates.size };
    for (const constraint of this.constraints) {
      summary[constraint.kind] = (summary[constraint.kind] ?? 0) + 1;
    }
    return summary;
  }

  private ids(candidates: readonly Candidate[]): number[] {
    return candidates.map(candidate => {
      if (!this.candidates.has(candidate.id)) {
        throw new Error(`Candidate #${candidate.id} (${candidate.label}) is not a variable of this model`);
      }
      return candidate.id;
    });
  }

  // ─── Solving ───────────────────────────────────────────────

  /** `nodeLimit` applies to each connected component separately. */
  solve(nodeLimit = 100_000): SolveResult {
    const selected = new Set<number>();
    const unresolved = new Set<number>();
    let objective = 0;
    let success = true;
    let exhausted = false;

    for (const component of this.components()) {
      const budget = { nodes: 0, limit: nodeLimit };
      const outcome = solveComponent(component.vars, component.constraints, this.weights, budget);
      if (outcome.exhausted) exhausted = true;
      if (outcome.best === null) {
        // Only a search that ran to completion proves infeasibility
        if (!outcome.exhausted) success = false;
        for (const id of component.vars) unresolved.add(id);
        continue;
      }
      for (const id of outcome.best) selected.add(id);
      objective += outcome.bestObjective;
    }

    return { success, selected, objective, exhausted, unresolved };
  }

  /** Connected components of the variable/constraint graph, variables ordered for branching */
  private components(): Array<{ vars: number[]; constraints: Constraint[] }> {
    const parent = new Map<number, number>();
    for (const id of this.candidates.keys()) parent.set(id, id);

    const find = (id: number): number => {
      let root = id;
      while (parent.get(root) !== root) root = parent.get(root) ?? root;
      parent.set(id, root);
      return root;
    };
    const join = (ids: readonly number[]): void => {
      for (let i = 1; i < ids.length; i++) {
        const a = find(ids[0]);
        const b = find(ids[i]);
        if (a !== b) parent.set(b, a);
      }
    };

    for (const constraint of this.constraints) join(constraintVars(constraint));

    const groups = new Map<number, { vars: number[]; constraints: Constraint[] }>();
    for (const id of this.candidates.keys()) {
      const root = find(id);
      const group = groups.get(root) ?? { vars: [], constraints: [] };
      group.vars.push(id);
      groups.set(root, group);
    }
    for (const constraint of this.constraints) {
      const vars = constraintVars(constraint);
      if (vars.length === 0) continue;
      groups.get(find(vars[0]))?.constraints.push(constraint);
    }

    const ordered = [...groups.values()];
    for (const group of ordered) {
      group.vars.sort((a, b) => (this.weights.get(b) ?? 0) - (this.weights.get(a) ?? 0) || a - b);
    }
    return ordered.sort((a, b) => Math.min(...a.vars) - Math.min(...b.vars));
  }
}

// ─── Branch and Bound ────────────────────────────────────────

function constraintVars(constraint: Constraint): number[] {
  switch (constraint.kind) {
    case 'at-most-one':
    case 'exactly-one':
      return constraint.vars;
    case 'implies':
      return [constraint.antecedent, constraint.consequent];
    case 'any-then-one-of':
      return [...constraint.triggers, ...constraint.targets];
  }
}

/** False when the partial assignment already breaks the constraint. */
function isSatisfiable(constraint: Constraint, value: ReadonlyMap<number, number>): boolean {
  const v = (id: number): number => value.get(id) ?? UNASSIGNED;

  switch (constraint.kind) {
    case 'at-most-one':
      return constraint.vars.filter(id => v(id) === 1).length <= 1;
    case 'exactly-one': {
      const on = constraint.vars.filter(id => v(id) === 1).length;
      const open = constraint.vars.some(id => v(id) === UNASSIGNED);
      return on === 1 || (on === 0 && open);
    }
    case 'implies':
      return !(v(constraint.antecedent) === 1 && v(constraint.consequent) === 0);
    case 'any-then-one-of': {
      if (!constraint.triggers.some(id => v(id) === 1)) return true;
      return constraint.targets.some(id => v(id) !== 0);
    }
  }
}

interface ComponentOutcome {
  best: number[] | null;
  bestObjective: number;
  exhausted: boolean;
}

function solveComponent(
  vars: readonly number[],
  constraints: readonly Constraint[],
  weights: ReadonlyMap<number, number>,
  budget: { nodes: number; limit: number },
): ComponentOutcome {
  const byVar = new Map<number, Constraint[]>();
  for (const constraint of constraints) {
    for (const id of constraintVars(constraint)) {
      const list = byVar.get(id) ?? [];
      if (!list.includes(constraint)) list.push(constraint);
      byVar.set(id, list);
    }
  }

  // Upper bound contribution of vars[i..]
  const remainingPositive: number[] = new Array<number>(vars.length + 1).fill(0);
  for (let i = vars.length - 1; i >= 0; i--) {
    remainingPositive[i] = remainingPositive[i + 1] + Math.max(0, weights.get(vars[i]) ?? 0);
  }

  const value = new Map<number, number>();
  const state: { best: number[] | null; bestObjective: number; exhausted: boolean } = {
    best: null,
    bestObjective: -Infinity,
    exhausted: false,
  };

  const search = (index: number, objective: number): void => {
    if (++budget.nodes > budget.limit) {
      state.exhausted = true;
      return;
    }
    if (state.best !== null && objective + remainingPositive[index] <= state.bestObjective) return;

    if (index === vars.length) {
      state.best = vars.filter(id => value.get(id) === 1);
      state.bestObjective = objective;
      return;
    }

    const id = vars[index];
    const touching = byVar.get(id) ?? [];
    for (const choice of [1, 0]) {
      value.set(id, choice);
      if (touching.every(c => isSatisfiable(c, value))) {
        search(index + 1, objective + (choice === 1 ? weights.get(id) ?? 0 : 0));
      }
      value.delete(id);
      if (state.exhausted) return;
    }
  };

  search(0, 0);
  return {
    best: state.best,
    bestObjective: state.best === null ? 0 : state.bestObjective,
    exhausted: state.exhausted,
  };
}

export const _testExports = {
  WEIGHT_SCALE,
  isSatisfiable,
};
