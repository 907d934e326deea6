/**
 * Part Image Classifier
 *
 * The picture of a part sits directly above its "2x" count, left-aligned
 * with it. Each image is paired with the count that fits it best; the Part
 * classifier later resolves images competing for the same count.
 */

import { bboxWidth } from '../../model/BBox';
import type { Block } from '../../model/types';
import { Ok } from '../result';
import { scoreExponentialDecay, scoreTriangular } from '../rules/scoring';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy, Score } from '../types';

/** How far a count may start above the image's bottom edge */
const VERTICAL_TOLERANCE = 2;

/** Left-edge offset at which alignment stops scoring */
const MAX_ALIGNMENT_OFFSET = 8;

type PartImageConfig = ClassifierConfig['partImage'];

/** Image paired with the part count below it */
export class PartImagePairScore implements Score {
  constructor(
    readonly countCandidate: Candidate<'part_count'>,
    readonly gap: number,
    readonly offset: number,
  ) {}

  score(): number {
    return 0.6 * scoreExponentialDecay(Math.max(0, this.gap), 10) + 0.4 * scoreTriangular(this.offset, 0, 0, MAX_ALIGNMENT_OFFSET);
  }
}

export function isImageLike(block: Block): boolean {
  return block.kind === 'image' || (block.kind === 'drawing' && block.imageId !== null);
}

export class PartImageClassifier implements LabelClassifier<'part_image'> {
  readonly name = 'PartImageClassifier';
  readonly output = 'part_image';
  readonly requires: ReadonlySet<Label> = new Set<Label>(['part_count']);
  // Piece-length marks are drawn inside part images
  readonly removal: RemovalPolicy = { removeChildren: false, removeNearDuplicates: true };
  private readonly config: PartImageConfig;

  constructor(config: ClassifierConfig) {
    this.config = config.partImage;
  }

  score(result: ClassificationResult): void {
    const counts = result.getWinners('part_count');
    if (counts.length === 0) return;

    for (const block of result.unconsumedBlocks()) {
      if (!isImageLike(block)) continue;

      let best: PartImagePairScore | null = null;
      for (const count of counts) {
        const pair = this.pair(block, count);
        if (pair !== null && (best === null || pair.score() > best.score())) best = pair;
      }
      if (best === null || best.score() < this.config.minScore) continue;

      result.addCandidate({
        label: 'part_image',
        score: best.score(),
        scoreDetails: best,
        sourceBlocks: [block],
      });
    }
  }

  build(candidate: Candidate<'part_image'>): BuildResult<'part_image'> {
    const block = candidate.sourceBlocks[0];
    const imageId = block !== undefined && block.kind !== 'text' ? block.imageId : null;
    return Ok({ kind: 'PartImage', bbox: candidate.bbox, imageId });
  }

  private pair(image: Block, count: Candidate<'part_count'>): PartImagePairScore | null {
    const gap = count.bbox.y0 - image.bbox.y1;
    if (gap < -VERTICAL_TOLERANCE || gap > this.config.maxGap) return null;

    const tolerance = this.config.alignmentTolerance;
    if (count.bbox.x0 < image.bbox.x0 - tolerance || count.bbox.x0 > image.bbox.x1 + tolerance) return null;
    // A count wider than its image belongs to something else
    if (bboxWidth(count.bbox) > bboxWidth(image.bbox) + 2 * tolerance) return null;

    return new PartImagePairScore(count, gap, Math.abs(count.bbox.x0 - image.bbox.x0));
  }
}
