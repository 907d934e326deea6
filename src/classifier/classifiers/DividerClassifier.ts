/**
 * Divider Classifier
 *
 * Thin lines that split a page into panels. Lines hugging the page edge are
 * page borders, not dividers.
 */

import { bboxHeight, bboxWidth } from '../../model/BBox';
import type { Divider } from '../../model/elements';
import type { DrawingBlock, RGB } from '../../model/types';
import { Err, Ok } from '../result';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy, Score } from '../types';

type DividerConfig = ClassifierConfig['divider'];

export class DividerScore implements Score {
  constructor(
    readonly lengthScore: number,
    readonly colorScore: number,
    readonly orientation: Divider['orientation'],
  ) {}

  score(): number {
    return this.lengthScore * 0.7 + this.colorScore * 0.3;
  }
}

/** Dividers are drawn in white or a light grey */
function scoreColor(block: DrawingBlock): number {
  const light = (c: RGB, min: number) => c.r > min && c.g > min && c.b > min;
  if (block.strokeColor !== null) {
    if (light(block.strokeColor, 0.9)) return 1;
    if (light(block.strokeColor, 0.7)) return 0.7;
    return 0.3;
  }
  if (block.fillColor !== null) {
    if (light(block.fillColor, 0.9)) return 0.8;
    if (light(block.fillColor, 0.7)) return 0.5;
  }
  return 0;
}

export class DividerClassifier implements LabelClassifier<'divider'> {
  readonly name = 'DividerClassifier';
  readonly output = 'divider';
  readonly requires: ReadonlySet<Label> = new Set<Label>(['progress_bar']);
  readonly removal: RemovalPolicy = { removeChildren: false, removeNearDuplicates: true };
  private readonly config: DividerConfig;

  constructor(config: ClassifierConfig) {
    this.config = config.divider;
  }

  score(result: ClassificationResult): void {
    const page = result.pageData.bbox;
    const { minLengthRatio, maxThickness, edgeMargin } = this.config;

    for (const block of result.unconsumedBlocks()) {
      if (block.kind !== 'drawing') continue;
      const b = block.bbox;
      const width = bboxWidth(b);
      const height = bboxHeight(b);

      let orientation: Divider['orientation'];
      let lengthRatio: number;
      if (width <= maxThickness && height >= bboxHeight(page) * minLengthRatio) {
        if (b.x0 <= page.x0 + edgeMargin || b.x1 >= page.x1 - edgeMargin) continue;
        orientation = 'vertical';
        lengthRatio = height / bboxHeight(page);
      } else if (height <= maxThickness && width >= bboxWidth(page) * minLengthRatio) {
        if (b.y0 <= page.y0 + edgeMargin || b.y1 >= page.y1 - edgeMargin) continue;
        orientation = 'horizontal';
        lengthRatio = width / bboxWidth(page);
      } else {
        continue;
      }

      const normalized = minLengthRatio < 1 ? (lengthRatio - minLengthRatio) / (1 - minLengthRatio) : 1;
      const details = new DividerScore(Math.min(1, normalized * 0.5 + 0.5), scoreColor(block), orientation);
      if (details.score() < this.config.minScore) continue;

      result.addCandidate({
        label: 'divider',
        score: details.score(),
        scoreDetails: details,
        sourceBlocks: [block],
      });
    }
  }

  build(candidate: Candidate<'divider'>): BuildResult<'divider'> {
    const details = candidate.scoreDetails;
    if (!(details instanceof DividerScore)) return Err('Divider candidate is missing its score details');
    return Ok({ kind: 'Divider', bbox: candidate.bbox, orientation: details.orientation });
  }
}
