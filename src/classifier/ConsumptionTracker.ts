/**
 * Consumption Tracker
 *
 * Records why each block left the pool of classifiable blocks. The first
 * record for a block is final; later attempts are ignored and reported back
 * to the caller as `false`.
 */

export type ConsumptionReason = 'won' | 'child-of-winner' | 'near-duplicate' | 'duplicate';

export interface ConsumptionRecord {
  readonly blockId: number;
  readonly reason: ConsumptionReason;
  /** Winning candidate that caused the consumption, when there is one */
  readonly candidateId: number | null;
  /** The block this one duplicates or sits inside, when there is one */
  readonly targetBlockId: number | null;
}

export class ConsumptionTracker {
  private readonly records = new Map<number, ConsumptionRecord>();

  /** Returns true when the block was newly consumed. */
  consume(
    blockId: number,
    reason: ConsumptionReason,
    candidateId: number | null = null,
    targetBlockId: number | null = null,
  ): boolean {
    if (this.records.has(blockId)) return false;
    this.records.set(blockId, { blockId, reason, candidateId, targetBlockId });
    return true;
  }

  isConsumed(blockId: number): boolean {
    return this.records.has(blockId);
  }

  get(blockId: number): ConsumptionRecord | null {
    return this.records.get(blockId) ?? null;
  }

  /** All records ordered by block id */
  entries(): ConsumptionRecord[] {
    return [...this.records.values()].sort((a, b) => a.blockId - b.blockId);
  }

  get size(): number {
    return this.records.size;
  }
}
