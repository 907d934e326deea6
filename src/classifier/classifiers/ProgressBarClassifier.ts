/**
 * Progress Bar Classifier
 *
 * Instruction pages carry a wide, thin bar along the bottom edge, often next
 * to the page number, showing how far through the build the page is. The
 * bar is usually drawn as a track plus a filled segment or marker; every
 * graphic lying within the track's band is taken as part of the bar.
 */

import { bboxCenter, bboxHeight, bboxWidth, clipTo, unionAll } from '../../model/BBox';
import type { BBox } from '../../model/BBox';
import type { Block } from '../../model/types';
import { Err, Ok } from '../result';
import { scoreLinear } from '../rules/scoring';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy, Score } from '../types';

type ProgressBarConfig = ClassifierConfig['progressBar'];

export class ProgressBarScore implements Score {
  constructor(
    readonly positionScore: number,
    readonly widthScore: number,
    readonly aspectRatioScore: number,
    /** The track block, before clipping to the page */
    readonly track: Block,
  ) {}

  score(): number {
    return (this.positionScore + this.widthScore + this.aspectRatioScore) / 3;
  }
}

export class ProgressBarClassifier implements LabelClassifier<'progress_bar'> {
  readonly name = 'ProgressBarClassifier';
  readonly output = 'progress_bar';
  readonly requires: ReadonlySet<Label> = new Set<Label>(['page_number']);
  readonly removal: RemovalPolicy = { removeChildren: true, removeNearDuplicates: true };
  private readonly config: ProgressBarConfig;

  constructor(config: ClassifierConfig) {
    this.config = config.progressBar;
  }

  score(result: ClassificationResult): void {
    const page = result.pageData.bbox;
    const pageNumberBox = result.getWinners('page_number')[0]?.bbox ?? null;
    const graphics = result.unconsumedBlocks().filter(b => b.kind !== 'text');
    const seen = new Set<string>();

    // Widest first, so a bar's track claims the bar before its fill segment does
    const byWidth = [...graphics].sort((a, b) => bboxWidth(b.bbox) - bboxWidth(a.bbox));
    for (const block of byWidth) {
      const positionScore = this.scoreBottomPosition(block.bbox, page, pageNumberBox);
      const widthScore = this.scoreWidth(block.bbox, page);
      const aspectRatioScore = this.scoreAspectRatio(block.bbox);
      if (positionScore === 0 || widthScore === 0 || aspectRatioScore === 0) continue;

      const details = new ProgressBarScore(positionScore, widthScore, aspectRatioScore, block);
      if (details.score() < this.config.minScore) continue;

      const sources = [block, ...this.findBarParts(block, graphics)];
      const key = sources.map(b => b.id).sort((a, b) => a - b).join(',');
      if (seen.has(key)) continue;
      seen.add(key);

      const bbox = clipTo(unionAll(sources.map(b => b.bbox)), page);
      if (bbox === null) continue;

      result.addCandidate({
        label: 'progress_bar',
        score: details.score(),
        scoreDetails: details,
        sourceBlocks: sources,
        bbox,
      });
    }
  }

  build(candidate: Candidate<'progress_bar'>): BuildResult<'progress_bar'> {
    const details = candidate.scoreDetails;
    if (!(details instanceof ProgressBarScore)) {
      return Err('Progress bar candidate is missing its score details');
    }
    const track = details.track.bbox;
    const fullWidth = bboxWidth(track);
    if (fullWidth <= 0) return Err('Progress bar track has no width');

    return Ok({
      kind: 'ProgressBar',
      bbox: candidate.bbox,
      progress: this.measureProgress(track, candidate.sourceBlocks.filter(b => b !== details.track)),
      fullWidth,
    });
  }

  winnerGroup(): string {
    return 'progress_bar';
  }

  // ─── Scoring ───────────────────────────────────────────────

  private scoreBottomPosition(bbox: BBox, page: BBox, pageNumber: BBox | null): number {
    const marginRatio = (page.y1 - bbox.y1) / bboxHeight(page);
    if (marginRatio < 0 || marginRatio > this.config.maxBottomMarginRatio) return 0;
    let score = 1 - marginRatio / this.config.maxBottomMarginRatio;

    if (pageNumber !== null) {
      const horizontalDistance = Math.min(Math.abs(bbox.x0 - pageNumber.x1), Math.abs(bbox.x1 - pageNumber.x0));
      if (horizontalDistance < bboxWidth(page) * this.config.maxPageNumberProximityRatio) {
        score *= this.config.pageNumberProximityMultiplier;
      }
    }
    return Math.min(1, score);
  }

  private scoreWidth(bbox: BBox, page: BBox): number {
    const ratio = bboxWidth(bbox) / bboxWidth(page);
    if (ratio < this.config.minWidthRatio) return 0;
    return scoreLinear(ratio, this.config.minWidthRatio, this.config.maxScoreWidthRatio);
  }

  private scoreAspectRatio(bbox: BBox): number {
    const height = bboxHeight(bbox);
    if (height <= 0) return 0;
    const aspect = bboxWidth(bbox) / height;
    if (aspect < this.config.minAspectRatio) return 0;
    return scoreLinear(aspect, this.config.minAspectRatio, this.config.idealAspectRatio);
  }

  /** Graphics inside the track's vertical band (with margin) and horizontal extent */
  private findBarParts(track: Block, graphics: readonly Block[]): Block[] {
    const margin = this.config.overlapMargin;
    const band = track.bbox;
    return graphics.filter(
      b =>
        b !== track &&
        b.bbox.y0 >= band.y0 - margin &&
        b.bbox.y1 <= band.y1 + margin &&
        b.bbox.x1 >= band.x0 &&
        b.bbox.x0 <= band.x1,
    );
  }

  /**
   * A filled segment starting at the track's left edge gives progress by its
   * width; otherwise the right-most marker's centre gives it.
   */
  private measureProgress(track: BBox, parts: readonly Block[]): number | null {
    const width = bboxWidth(track);
    const margin = this.config.overlapMargin;

    const fills = parts.filter(p => Math.abs(p.bbox.x0 - track.x0) <= margin && bboxWidth(p.bbox) < width);
    if (fills.length > 0) {
      const widest = Math.max(...fills.map(p => p.bbox.x1));
      return clamp01((widest - track.x0) / width);
    }

    if (parts.length === 0) return null;
    const marker = Math.max(...parts.map(p => bboxCenter(p.bbox).x));
    return clamp01((marker - track.x0) / width);
  }
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}
