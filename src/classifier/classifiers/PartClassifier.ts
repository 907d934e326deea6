/**
 * Part Classifier
 *
 * Assembles one Part per winning part count, attaching at most one image,
 * one element id and one piece length. Images and element ids are assigned
 * one-to-one, best match first.
 */

import { overlapsHorizontal, unionAll } from '../../model/BBox';
import type { BBox } from '../../model/BBox';
import { Err, Ok } from '../result';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy, Score } from '../types';
import { PartImagePairScore } from './PartImageClassifier';
import { PieceLengthScore } from './PieceLengthClassifier';

/** Score of a part whose count has no image */
const UNPAIRED_SCORE = 0.5;

/** Bonus per attached element id or piece length */
const OPTIONAL_CHILD_BONUS = 0.01;

export class PartScore implements Score {
  constructor(
    readonly count: Candidate<'part_count'>,
    readonly image: Candidate<'part_image'> | null,
    readonly number: Candidate<'part_number'> | null,
    readonly length: Candidate<'piece_length'> | null,
  ) {}

  score(): number {
    const base = this.image !== null && this.image.scoreDetails instanceof PartImagePairScore
      ? this.image.scoreDetails.score()
      : UNPAIRED_SCORE;
    const optional = (this.number !== null ? 1 : 0) + (this.length !== null ? 1 : 0);
    return Math.min(1, base + OPTIONAL_CHILD_BONUS * optional);
  }
}

export class PartClassifier implements LabelClassifier<'part'> {
  readonly name = 'PartClassifier';
  readonly output = 'part';
  readonly requires: ReadonlySet<Label> = new Set<Label>(['part_count', 'part_image', 'part_number', 'piece_length']);
  readonly removal: RemovalPolicy = { removeChildren: false, removeNearDuplicates: false };
  private readonly maxNumberGap: number;
  private readonly minScore: number;

  constructor(config: ClassifierConfig) {
    this.maxNumberGap = config.parts.partNumberMaxGap;
    this.minScore = config.parts.minScore;
  }

  score(result: ClassificationResult): void {
    const counts = result.getWinners('part_count');
    if (counts.length === 0) return;

    const images = this.pairImages(counts, result.getWinners('part_image'));
    const numbers = this.pairNumbers(counts, result.getWinners('part_number'));
    const lengths = result.getWinners('piece_length');

    for (const count of counts) {
      const image = images.get(count) ?? null;
      const length =
        image === null
          ? null
          : lengths.find(l => l.scoreDetails instanceof PieceLengthScore && l.scoreDetails.imageCandidate === image) ?? null;
      const details = new PartScore(count, image, numbers.get(count) ?? null, length);
      if (details.score() < this.minScore) continue;

      const boxes: BBox[] = [count.bbox];
      if (image) boxes.push(image.bbox);
      if (details.number) boxes.push(details.number.bbox);
      if (length) boxes.push(length.bbox);

      result.addCandidate({
        label: 'part',
        score: details.score(),
        scoreDetails: details,
        sourceBlocks: [],
        bbox: unionAll(boxes),
      });
    }
  }

  build(candidate: Candidate<'part'>): BuildResult<'part'> {
    const details = candidate.scoreDetails;
    if (!(details instanceof PartScore)) return Err('Part candidate is missing its score details');
    const count = details.count.constructed;
    if (count === null) return Err(`Part count #${details.count.id} was not built`);

    return Ok({
      kind: 'Part',
      bbox: candidate.bbox,
      count,
      diagram: details.image?.constructed ?? null,
      number: details.number?.constructed ?? null,
      length: details.length?.constructed ?? null,
    });
  }

  winnerGroup(candidate: Candidate<'part'>): string | null {
    const details = candidate.scoreDetails;
    return details instanceof PartScore ? `count:${details.count.id}` : null;
  }

  // ─── Pairing ───────────────────────────────────────────────

  private pairImages(
    counts: readonly Candidate<'part_count'>[],
    images: readonly Candidate<'part_image'>[],
  ): Map<Candidate<'part_count'>, Candidate<'part_image'>> {
    const pairs: Array<{ count: Candidate<'part_count'>; image: Candidate<'part_image'>; score: number }> = [];
    for (const image of images) {
      const details = image.scoreDetails;
      if (!(details instanceof PartImagePairScore)) continue;
      if (!counts.includes(details.countCandidate)) continue;
      pairs.push({ count: details.countCandidate, image, score: details.score() });
    }
    pairs.sort((a, b) => b.score - a.score || a.image.id - b.image.id);

    const assigned = new Map<Candidate<'part_count'>, Candidate<'part_image'>>();
    const usedImages = new Set<Candidate<'part_image'>>();
    for (const { count, image } of pairs) {
      if (assigned.has(count) || usedImages.has(image)) continue;
      assigned.set(count, image);
      usedImages.add(image);
    }
    return assigned;
  }

  /** Element ids printed just below a count, overlapping it horizontally */
  private pairNumbers(
    counts: readonly Candidate<'part_count'>[],
    numbers: readonly Candidate<'part_number'>[],
  ): Map<Candidate<'part_count'>, Candidate<'part_number'>> {
    const pairs: Array<{ count: Candidate<'part_count'>; number: Candidate<'part_number'>; gap: number }> = [];
    for (const count of counts) {
      for (const number of numbers) {
        const gap = number.bbox.y0 - count.bbox.y1;
        if (gap < -2 || gap > this.maxNumberGap) continue;
        if (!overlapsHorizontal(count.bbox, number.bbox)) continue;
        pairs.push({ count, number, gap: Math.max(0, gap) });
      }
    }
    pairs.sort((a, b) => a.gap - b.gap || a.count.id - b.count.id || a.number.id - b.number.id);

    const assigned = new Map<Candidate<'part_count'>, Candidate<'part_number'>>();
    const used = new Set<Candidate<'part_number'>>();
    for (const { count, number } of pairs) {
      if (assigned.has(count) || used.has(number)) continue;
      assigned.set(count, number);
      used.add(number);
    }
    return assigned;
  }
}
