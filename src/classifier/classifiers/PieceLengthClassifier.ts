/**
 * Piece Length Classifier
 *
 * Axles and beams carry their length as a small numeral inside the part
 * image, near its top-right corner.
 */

import { bboxHeight, bboxWidth, fullyInside } from '../../model/BBox';
import { Err, Ok } from '../result';
import { scoreExponentialDecay } from '../rules/scoring';
import { extractPieceLengthValue } from '../TextExtractors';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy, Score } from '../types';
import { soleTextBlock } from './RuleBasedClassifier';

export class PieceLengthScore implements Score {
  constructor(
    readonly imageCandidate: Candidate<'part_image'>,
    /** Distance from the text centre to the image's top-right corner */
    readonly cornerDistance: number,
    readonly scale: number,
  ) {}

  score(): number {
    return scoreExponentialDecay(this.cornerDistance, this.scale);
  }
}

export class PieceLengthClassifier implements LabelClassifier<'piece_length'> {
  readonly name = 'PieceLengthClassifier';
  readonly output = 'piece_length';
  readonly requires: ReadonlySet<Label> = new Set<Label>(['part_image']);
  readonly removal: RemovalPolicy = { removeChildren: false, removeNearDuplicates: false };
  private readonly minScore: number;

  constructor(config: ClassifierConfig) {
    this.minScore = config.pieceLength.minScore;
  }

  score(result: ClassificationResult): void {
    const images = result.getWinners('part_image');
    if (images.length === 0) return;

    for (const block of result.unconsumedBlocks()) {
      if (block.kind !== 'text' || extractPieceLengthValue(block.text) === null) continue;

      const image = images.find(img => fullyInside(block.bbox, img.bbox));
      if (image === undefined) continue;

      const cx = (block.bbox.x0 + block.bbox.x1) / 2;
      const cy = (block.bbox.y0 + block.bbox.y1) / 2;
      const distance = Math.hypot(image.bbox.x1 - cx, cy - image.bbox.y0);
      const scale = Math.max(1, 0.5 * Math.hypot(bboxWidth(image.bbox), bboxHeight(image.bbox)));
      const details = new PieceLengthScore(image, distance, scale);
      if (details.score() < this.minScore) continue;

      result.addCandidate({
        label: 'piece_length',
        score: details.score(),
        scoreDetails: details,
        sourceBlocks: [block],
      });
    }
  }

  build(candidate: Candidate<'piece_length'>): BuildResult<'piece_length'> {
    const text = soleTextBlock(candidate);
    if (!text.ok) return text;
    const value = extractPieceLengthValue(text.value.text);
    if (value === null) return Err(`Could not parse piece length from '${text.value.text}'`);
    return Ok({ kind: 'PieceLength', bbox: candidate.bbox, value });
  }

  /** One length per image */
  winnerGroup(candidate: Candidate<'piece_length'>): string | null {
    const details = candidate.scoreDetails;
    return details instanceof PieceLengthScore ? `image:${details.imageCandidate.id}` : null;
  }
}
