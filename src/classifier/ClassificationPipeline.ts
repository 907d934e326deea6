/**
 * Classification Pipeline
 *
 * Runs a fixed set of per-label classifiers over one page at a time:
 *
 *   for each classifier, in dependency order:
 *     score  -> candidates for its label
 *     build  -> element per candidate, or a failure reason
 *     select -> winners (greedy, or deferred to the constraint solver)
 *
 * Classifiers that declare constraints are selected together at the solver
 * barrier, placed just before the first classifier that reads one of their
 * labels. The classifier set is validated once, at construction.
 */

import { partsListTotalItems } from '../model/elements';
import type { PageData } from '../model/types';
import { ClassificationResult } from './ClassificationResult';
import type { ClassifierConfig } from './ClassifierConfig';
import { ConstraintModel } from './ConstraintModel';
import { ClassifierConfigError, InvariantViolationError } from './errors';
import { topologicalSort } from './TopologicalSort';
import type { Candidate, ClassifierHints, Label, LabelClassifier, RemovalPolicy } from './types';

const LOG_PREFIX = '[ClassificationPipeline]';

export class ClassificationPipeline {
  /** Classifiers in execution order */
  readonly classifiers: readonly LabelClassifier[];
  /** Labels whose selection is left to the constraint solver */
  readonly solverLabels: ReadonlySet<Label>;
  /** Index in `classifiers` before which the solver runs; null when nothing reads a solver label */
  readonly barrierIndex: number | null;

  private readonly config: ClassifierConfig;

  constructor(classifiers: readonly LabelClassifier[], config: ClassifierConfig) {
    this.config = config;
    this.classifiers = topologicalSort(classifiers);

    const solverLabels = new Set<Label>();
    if (config.useConstraintSolver) {
      for (const classifier of this.classifiers) {
        if (classifier.declareConstraints !== undefined) solverLabels.add(classifier.output);
      }
    }
    this.solverLabels = solverLabels;

    const barrier = this.classifiers.findIndex(c => [...c.requires].some(label => solverLabels.has(label)));
    this.barrierIndex = barrier === -1 ? null : barrier;

    if (this.barrierIndex !== null) {
      const consumer = this.classifiers[this.barrierIndex];
      const late = this.classifiers.slice(this.barrierIndex).find(c => solverLabels.has(c.output));
      if (late !== undefined) {
        throw new ClassifierConfigError(
          'solver-order',
          `Solver-managed classifier '${late.name}' runs after '${consumer.name}', which reads solver-managed labels`,
        );
      }
    }
  }

  /**
   * Classify one page.
   *
   * @param preConsumed - block id -> id of the block it duplicates; these
   *   blocks are marked consumed as duplicates before any classifier runs
   */
  classify(
    pageData: PageData,
    hints: ClassifierHints,
    preConsumed: ReadonlyMap<number, number> = new Map(),
  ): ClassificationResult {
    const result = new ClassificationResult(pageData, hints, {
      nearDuplicateIouThreshold: this.config.nearDuplicateIouThreshold,
    });

    const pageBlockIds = new Set(pageData.blocks.map(b => b.id));
    for (const [blockId, keptId] of preConsumed) {
      if (pageBlockIds.has(blockId)) result.consumption.consume(blockId, 'duplicate', null, keptId);
    }

    const deferred: LabelClassifier[] = [];
    this.classifiers.forEach((classifier, index) => {
      if (index === this.barrierIndex) this.selectWithSolver(deferred, result);

      classifier.score(result);
      this.buildCandidates(classifier, result);

      if (this.solverLabels.has(classifier.output)) {
        deferred.push(classifier);
      } else {
        this.selectGreedy(classifier, result);
      }
      this.debug(result, classifier);
    });
    if (this.barrierIndex === null && deferred.length > 0) this.selectWithSolver(deferred, result);

    this.addStructureWarnings(result);
    this.checkInvariants(result);
    return result;
  }

  // ─── Build ─────────────────────────────────────────────────

  private buildCandidates(classifier: LabelClassifier, result: ClassificationResult): void {
    for (const candidate of result.getCandidates(classifier.output)) {
      if (candidate.constructed !== null) continue;
      const built = classifier.build(candidate, result);
      if (built.ok) {
        candidate.constructed = built.value;
      } else {
        candidate.failureReason ??= built.error;
      }
    }
  }

  // ─── Selection ─────────────────────────────────────────────

  /**
   * Best score first; a candidate whose winner group is already taken loses.
   * With `only`, candidates outside that id set are left alone.
   */
  private selectGreedy(classifier: LabelClassifier, result: ClassificationResult, only?: ReadonlySet<number>): void {
    const groupWinners = new Map<string, Candidate>();
    for (const winner of result.getWinners(classifier.output)) {
      const group = classifier.winnerGroup?.(winner) ?? null;
      if (group !== null) groupWinners.set(group, winner);
    }

    for (const candidate of result.getScoredCandidates(classifier.output)) {
      if (only !== undefined && !only.has(candidate.id)) continue;
      if (!result.isEligible(candidate)) continue;

      const group = classifier.winnerGroup?.(candidate) ?? null;
      const holder = group !== null ? groupWinners.get(group) : undefined;
      if (holder !== undefined) {
        candidate.failureReason = `Lost conflict to '${holder.label}' (score=${holder.score.toFixed(3)})`;
        continue;
      }

      if (result.accept(candidate, classifier.removal) && group !== null) {
        groupWinners.set(group, candidate);
      }
    }
  }

  /**
   * Select all deferred labels at once. Winners are marked before any
   * removals are applied, so one winner's removal never claims another
   * winner's sources. Candidates the solver left unresolved fall back to
   * greedy selection afterwards.
   */
  private selectWithSolver(deferred: LabelClassifier[], result: ClassificationResult): void {
    if (deferred.length === 0) return;
    const classifiers = deferred.splice(0);

    const model = new ConstraintModel();
    const eligible: Candidate[] = [];
    for (const classifier of classifiers) {
      const candidates = result.getCandidates(classifier.output).filter(c => result.isEligible(c));
      for (const candidate of candidates) model.addCandidate(candidate);
      classifier.declareConstraints?.(model, candidates, result);
      eligible.push(...candidates);
    }
    model.addBlockExclusivityConstraints();

    const solution = model.solve(this.config.solverNodeLimit);
    const page = result.pageData.pageNumber;
    if (!solution.success) {
      this.solverWarning(result, `Page ${page}: constraint solver found no feasible selection for some candidates; using greedy selection for them`);
    }
    if (solution.exhausted) {
      this.solverWarning(result, `Page ${page}: constraint solver hit its node limit; selection may not be optimal`);
    }

    const policyByLabel = new Map<Label, RemovalPolicy>();
    for (const classifier of classifiers) policyByLabel.set(classifier.output, classifier.removal);
    const selected = eligible
      .filter(c => solution.selected.has(c.id))
      .sort((a, b) => b.score - a.score || a.id - b.id);
    const winners = selected.filter(c => result.markWinner(c));
    for (const winner of winners) {
      const policy = policyByLabel.get(winner.label);
      if (policy !== undefined) result.applyRemovals(winner, policy);
    }

    for (const candidate of eligible) {
      if (candidate.isWinner || solution.unresolved.has(candidate.id)) continue;
      candidate.failureReason ??= 'Not selected by constraint solver';
    }
    if (solution.unresolved.size > 0) {
      for (const classifier of classifiers) this.selectGreedy(classifier, result, solution.unresolved);
    }

    if (this.config.debug) {
      console.log(`${LOG_PREFIX} Page ${page}: solver selected ${winners.length} of ${eligible.length}`, model.getConstraintSummary());
    }
  }

  private solverWarning(result: ClassificationResult, message: string): void {
    console.warn(`${LOG_PREFIX} ${message}`);
    result.addWarning(message);
  }

  // ─── Checks ────────────────────────────────────────────────

  private addStructureWarnings(result: ClassificationResult): void {
    const page = result.pageData.pageNumber;

    if (result.getWinners('page_number').length === 0) {
      result.addWarning(`Page ${page}: missing page number`);
    }
    if (result.getWinners('step').length === 0 && this.expectsSteps(result)) {
      result.addWarning(`Page ${page}: no steps found`);
    }
    for (const list of result.getWinners('parts_list')) {
      if (list.constructed !== null && partsListTotalItems(list.constructed) === 0) {
        result.addWarning(`Page ${page}: parts list #${list.id} contains no part counts`);
      }
    }
    for (const step of result.getWinnerElements('step')) {
      if (step.partsList === null) {
        result.addWarning(`Page ${page}: step ${step.stepNumber.value} has no parts list above it`);
      }
    }
  }

  /** Instruction content without any step: a hinted instruction page, step numerals, or part counts off a catalog page */
  private expectsSteps(result: ClassificationResult): boolean {
    const page = result.pageData.pageNumber;
    const pages = result.hints.pages;
    if (pages.isInstructionPage(page)) return true;
    if (result.getCandidates('step_number').length > 0) return true;
    return result.getWinners('part_count').length > 0 && !pages.isCatalogPage(page);
  }

  private checkInvariants(result: ClassificationResult): void {
    const violations = result.checkInvariants();
    if (violations.length === 0) return;
    if (this.config.strictInvariants) throw new InvariantViolationError(violations);

    for (const violation of violations) {
      const message = `Page ${result.pageData.pageNumber}: invariant violated: ${violation}`;
      console.warn(`${LOG_PREFIX} ${message}`);
      result.addWarning(message);
    }
  }

  private debug(result: ClassificationResult, classifier: LabelClassifier): void {
    if (!this.config.debug) return;
    const candidates = result.getCandidates(classifier.output);
    const winners = candidates.filter(c => c.isWinner).length;
    const pending = this.solverLabels.has(classifier.output) && winners === 0 ? ' (deferred)' : '';
    console.log(
      `${LOG_PREFIX} Page ${result.pageData.pageNumber}: ${classifier.name} -> ${candidates.length} candidate(s), ${winners} winner(s)${pending}`,
    );
  }
}
