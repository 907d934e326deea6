/**
 * Classification Result
 *
 * Everything known about one page while (and after) it is classified:
 * candidates per label, which blocks have been consumed and why, and the
 * warnings raised on the way. Classifiers read and add candidates here; only
 * the pipeline marks winners.
 */

import { fullyInside, iou, unionAll } from '../model/BBox';
import type { Page } from '../model/elements';
import type { Block, PageData } from '../model/types';
import { ConsumptionTracker } from './ConsumptionTracker';
import type { ConsumptionRecord } from './ConsumptionTracker';
import { InvariantViolationError } from './errors';
import { COMPOSITE_LABELS, LABELS } from './types';
import type {
  AnyCandidate,
  Candidate,
  CandidateInit,
  ClassifierHints,
  Label,
  LabelElementMap,
  RemovalPolicy,
} from './types';

type CandidateStore = { [L in Label]: Candidate<L>[] };

export interface ClassificationResultOptions {
  /** IoU above which an unconsumed block is claimed by a winner as a near duplicate */
  nearDuplicateIouThreshold: number;
}

function emptyStore(): CandidateStore {
  return {
    page_number: [],
    step_number: [],
    part_count: [],
    part_number: [],
    piece_length: [],
    part_image: [],
    part: [],
    parts_list: [],
    progress_bar: [],
    bag_number: [],
    new_bag: [],
    background: [],
    divider: [],
    diagram: [],
    step: [],
    page: [],
  };
}

export class ClassificationResult {
  readonly pageData: PageData;
  readonly hints: ClassifierHints;
  readonly consumption = new ConsumptionTracker();

  private readonly options: ClassificationResultOptions;
  private readonly store: CandidateStore = emptyStore();
  private readonly byId = new Map<number, Candidate>();
  private readonly blockIds: ReadonlySet<number>;
  private readonly sourceKeys = new Set<string>();
  private readonly warningList: string[] = [];
  private nextCandidateId = 0;

  constructor(pageData: PageData, hints: ClassifierHints, options: ClassificationResultOptions) {
    this.pageData = pageData;
    this.hints = hints;
    this.options = options;
    this.blockIds = new Set(pageData.blocks.map(b => b.id));
  }

  // ─── Candidates ────────────────────────────────────────────

  /**
   * Register a new candidate. Throws InvariantViolationError when the same
   * label already has a candidate over exactly these source blocks, when a
   * source block is not on this page, or when the composite/leaf source rule
   * is broken.
   */
  addCandidate<L extends Label>(init: CandidateInit<L>): Candidate<L> {
    const { label, sourceBlocks } = init;

    for (const block of sourceBlocks) {
      if (!this.blockIds.has(block.id)) {
        throw new InvariantViolationError([`Block ${block.id} is not on page ${this.pageData.pageNumber}`]);
      }
    }

    let bbox = init.bbox;
    if (COMPOSITE_LABELS.has(label)) {
      if (sourceBlocks.length > 0) {
        throw new InvariantViolationError([`Composite label '${label}' cannot own source blocks`]);
      }
      if (bbox === undefined) {
        throw new InvariantViolationError([`Composite label '${label}' needs an explicit bbox`]);
      }
    } else {
      if (sourceBlocks.length === 0) {
        throw new InvariantViolationError([`Label '${label}' needs at least one source block`]);
      }
      const key = `${label}:${sourceBlocks.map(b => b.id).sort((a, b) => a - b).join(',')}`;
      if (this.sourceKeys.has(key)) {
        throw new InvariantViolationError([`Duplicate candidate for '${label}' over blocks [${key.split(':')[1]}]`]);
      }
      this.sourceKeys.add(key);
      bbox ??= unionAll(sourceBlocks.map(b => b.bbox));
    }

    const candidate: Candidate<L> = {
      id: this.nextCandidateId++,
      label,
      bbox,
      score: init.score,
      scoreDetails: init.scoreDetails,
      sourceBlocks: [...sourceBlocks],
      constructed: null,
      failureReason: null,
      isWinner: false,
    };
    this.store[label].push(candidate);
    this.byId.set(candidate.id, candidate);
    return candidate;
  }

  getCandidates<L extends Label>(label: L): readonly Candidate<L>[] {
    return this.store[label];
  }

  /** Candidates whose element was built, best score first */
  getScoredCandidates<L extends Label>(label: L): Candidate<L>[] {
    return this.store[label]
      .filter(c => c.constructed !== null)
      .sort((a, b) => b.score - a.score || a.id - b.id);
  }

  getCandidateById(id: number): Candidate | null {
    return this.byId.get(id) ?? null;
  }

  /** Every candidate of every label, in creation order */
  allCandidates(): AnyCandidate[] {
    const all: AnyCandidate[] = [];
    for (const label of LABELS) all.push(...this.store[label]);
    return all.sort((a, b) => a.id - b.id);
  }

  getWinners<L extends Label>(label: L): Candidate<L>[] {
    return this.store[label].filter(c => c.isWinner);
  }

  getWinnerElements<L extends Label>(label: L): LabelElementMap[L][] {
    const elements: LabelElementMap[L][] = [];
    for (const candidate of this.store[label]) {
      if (candidate.isWinner && candidate.constructed !== null) elements.push(candidate.constructed);
    }
    return elements;
  }

  /** The winning candidate whose element is exactly `element`, if any */
  findWinnerFor<L extends Label>(label: L, element: LabelElementMap[L]): Candidate<L> | null {
    return this.store[label].find(c => c.isWinner && c.constructed === element) ?? null;
  }

  get page(): Page | null {
    return this.getWinnerElements('page')[0] ?? null;
  }

  // ─── Blocks ────────────────────────────────────────────────

  isConsumed(block: Block): boolean {
    return this.consumption.isConsumed(block.id);
  }

  getConsumption(block: Block): ConsumptionRecord | null {
    return this.consumption.get(block.id);
  }

  /** Label of the winner that owns `block`, or null when no winner does */
  getLabel(block: Block): Label | null {
    const record = this.consumption.get(block.id);
    if (record === null || record.reason !== 'won' || record.candidateId === null) return null;
    return this.byId.get(record.candidateId)?.label ?? null;
  }

  unconsumedBlocks(): Block[] {
    return this.pageData.blocks.filter(b => !this.consumption.isConsumed(b.id));
  }

  // ─── Warnings ──────────────────────────────────────────────

  get warnings(): readonly string[] {
    return this.warningList;
  }

  addWarning(message: string): void {
    this.warningList.push(message);
  }

  // ─── Selection ─────────────────────────────────────────────

  /** True when the candidate was built, has not lost, and all its source blocks are free. */
  isEligible(candidate: Candidate): boolean {
    return (
      !candidate.isWinner &&
      candidate.constructed !== null &&
      candidate.failureReason === null &&
      candidate.sourceBlocks.every(b => !this.consumption.isConsumed(b.id))
    );
  }

  /**
   * Mark a candidate as a winner and consume its source blocks.
   * Returns false, and leaves the result untouched, when a source block is
   * already consumed.
   */
  markWinner(candidate: Candidate): boolean {
    const taken = candidate.sourceBlocks.find(b => this.consumption.isConsumed(b.id));
    if (taken !== undefined) {
      candidate.failureReason ??= `Source block ${taken.id} already consumed`;
      return false;
    }
    candidate.isWinner = true;
    for (const block of candidate.sourceBlocks) {
      this.consumption.consume(block.id, 'won', candidate.id);
    }
    this.failConflictingCandidates(candidate, new Set(candidate.sourceBlocks.map(b => b.id)));
    return true;
  }

  /**
   * Consume the unconsumed blocks a winner claims beyond its sources:
   * blocks fully inside its bbox and blocks that nearly duplicate it.
   */
  applyRemovals(winner: Candidate, policy: RemovalPolicy): number[] {
    const removed: number[] = [];
    const ownIds = new Set(winner.sourceBlocks.map(b => b.id));
    const target = winner.sourceBlocks.length === 1 ? winner.sourceBlocks[0].id : null;

    for (const block of this.pageData.blocks) {
      if (ownIds.has(block.id) || this.consumption.isConsumed(block.id)) continue;
      if (policy.removeChildren && fullyInside(block.bbox, winner.bbox)) {
        this.consumption.consume(block.id, 'child-of-winner', winner.id, target);
        removed.push(block.id);
      } else if (policy.removeNearDuplicates && iou(block.bbox, winner.bbox) > this.options.nearDuplicateIouThreshold) {
        this.consumption.consume(block.id, 'near-duplicate', winner.id, target);
        removed.push(block.id);
      }
    }

    if (removed.length > 0) this.failConflictingCandidates(winner, new Set(removed));
    return removed;
  }

  /** markWinner followed by applyRemovals */
  accept(candidate: Candidate, policy: RemovalPolicy): boolean {
    if (!this.markWinner(candidate)) return false;
    this.applyRemovals(candidate, policy);
    return true;
  }

  private failConflictingCandidates(winner: Candidate, consumedIds: ReadonlySet<number>): void {
    for (const candidate of this.byId.values()) {
      if (candidate.isWinner || candidate.failureReason !== null) continue;
      const hit = candidate.sourceBlocks.find(b => consumedIds.has(b.id));
      if (hit === undefined) continue;

      const record = this.consumption.get(hit.id);
      candidate.failureReason =
        record === null || record.reason === 'won'
          ? `Lost conflict to '${winner.label}' (score=${winner.score.toFixed(3)})`
          : `Source block ${hit.id} removed as ${record.reason} of '${winner.label}'`;
    }
  }

  // ─── Invariants ────────────────────────────────────────────

  /** Human-readable descriptions of every broken invariant; empty when all hold */
  checkInvariants(): string[] {
    const violations: string[] = [];
    const owners = new Map<number, Candidate[]>();

    for (const candidate of this.byId.values()) {
      if (!candidate.isWinner) continue;
      for (const block of candidate.sourceBlocks) {
        const list = owners.get(block.id) ?? [];
        list.push(candidate);
        owners.set(block.id, list);

        const record = this.consumption.get(block.id);
        if (record === null) {
          violations.push(`Block ${block.id} is a source of winner #${candidate.id} but was never consumed`);
        } else if (record.reason !== 'won') {
          violations.push(`Block ${block.id} is a source of winner #${candidate.id} but was removed as ${record.reason}`);
        } else if (record.candidateId !== candidate.id) {
          violations.push(`Block ${block.id} is a source of winner #${candidate.id} but was consumed by #${record.candidateId}`);
        }
      }
    }

    for (const [blockId, winners] of owners) {
      const labels = new Set(winners.map(c => c.label));
      if (winners.length > 1) {
        violations.push(`Block ${blockId} won by ${winners.length} candidates (${[...labels].sort().join(', ')})`);
      }
    }

    return violations;
  }
}
