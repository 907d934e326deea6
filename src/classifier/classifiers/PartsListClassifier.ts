/**
 * Parts List Classifier
 *
 * A parts list is the framed panel above a step number that holds the
 * step's parts. Candidate frames are drawings above at least one step
 * number; each part is attributed to the innermost frame containing it
 * (and to frames that merely repeat that one, such as a border drawn over
 * a fill).
 */

import { bboxArea, iou } from '../../model/BBox';
import type { BBox } from '../../model/BBox';
import { buildHierarchy } from '../../model/HierarchyBuilder';
import type { DrawingBlock } from '../../model/types';
import { Err, Ok } from '../result';
import { scoreExponentialDecay } from '../rules/scoring';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy, Score } from '../types';

/** How far a frame's bottom edge may run past the top of its step number */
const STEP_OVERLAP_TOLERANCE = 2;

type PartsListConfig = ClassifierConfig['partsList'];

export class PartsListScore implements Score {
  constructor(
    readonly parts: readonly Candidate<'part'>[],
    /** Vertical gap to the nearest step number below */
    readonly stepGap: number,
    private readonly config: PartsListConfig,
  ) {}

  get partsScore(): number {
    return Math.min(1, 0.5 + 0.25 * this.parts.length);
  }

  get proximityScore(): number {
    return scoreExponentialDecay(this.stepGap, this.config.proximityScale);
  }

  score(): number {
    const total = this.config.partsWeight + this.config.proximityWeight;
    if (total <= 0) return 0;
    return (this.config.partsWeight * this.partsScore + this.config.proximityWeight * this.proximityScore) / total;
  }
}

type Node =
  | { kind: 'frame'; bbox: BBox; drawing: DrawingBlock }
  | { kind: 'part'; bbox: BBox; part: Candidate<'part'> };

export class PartsListClassifier implements LabelClassifier<'parts_list'> {
  readonly name = 'PartsListClassifier';
  readonly output = 'parts_list';
  readonly requires: ReadonlySet<Label> = new Set<Label>(['part', 'step_number']);
  readonly removal: RemovalPolicy = { removeChildren: true, removeNearDuplicates: true };
  private readonly config: PartsListConfig;
  private readonly nearDuplicateIou: number;

  constructor(config: ClassifierConfig) {
    this.config = config.partsList;
    this.nearDuplicateIou = config.nearDuplicateIouThreshold;
  }

  score(result: ClassificationResult): void {
    const parts = result.getWinners('part');
    const steps = result.getWinners('step_number');
    if (parts.length === 0 || steps.length === 0) return;

    const maxArea = bboxArea(result.pageData.bbox) * this.config.maxAreaRatio;
    const frames = result
      .unconsumedBlocks()
      .filter((b): b is DrawingBlock => b.kind === 'drawing')
      .filter(d => bboxArea(d.bbox) <= maxArea)
      .filter(d => this.stepGap(d.bbox, steps) !== null);
    if (frames.length === 0) return;

    const nodes: Node[] = [
      ...frames.map((drawing): Node => ({ kind: 'frame', bbox: drawing.bbox, drawing })),
      ...parts.map((part): Node => ({ kind: 'part', bbox: part.bbox, part })),
    ];
    const tree = buildHierarchy(nodes);

    const partsByFrame = new Map<DrawingBlock, Candidate<'part'>[]>();
    for (const node of nodes) {
      if (node.kind !== 'part') continue;
      const frames = tree.getAncestors(node).filter((a): a is Extract<Node, { kind: 'frame' }> => a.kind === 'frame');
      const innermost = frames[0];
      if (innermost === undefined) continue;
      for (const frame of frames) {
        if (frame !== innermost && iou(frame.bbox, innermost.bbox) <= this.nearDuplicateIou) continue;
        const list = partsByFrame.get(frame.drawing) ?? [];
        list.push(node.part);
        partsByFrame.set(frame.drawing, list);
      }
    }

    for (const drawing of frames) {
      const contained = partsByFrame.get(drawing);
      const gap = this.stepGap(drawing.bbox, steps);
      if (contained === undefined || gap === null) continue;

      const details = new PartsListScore(contained, gap, this.config);
      if (details.score() < this.config.minScore) continue;

      result.addCandidate({
        label: 'parts_list',
        score: details.score(),
        scoreDetails: details,
        sourceBlocks: [drawing],
      });
    }
  }

  build(candidate: Candidate<'parts_list'>): BuildResult<'parts_list'> {
    const details = candidate.scoreDetails;
    if (!(details instanceof PartsListScore)) return Err('Parts list candidate is missing its score details');
    const parts = details.parts.flatMap(p => (p.constructed !== null ? [p.constructed] : []));
    if (parts.length === 0) return Err('Parts list has no built parts');
    return Ok({ kind: 'PartsList', bbox: candidate.bbox, parts });
  }

  /** Gap from the frame's bottom to the nearest step number at or below it, null if none */
  private stepGap(frame: BBox, steps: readonly Candidate<'step_number'>[]): number | null {
    let best: number | null = null;
    for (const step of steps) {
      if (frame.y1 > step.bbox.y0 + STEP_OVERLAP_TOLERANCE) continue;
      const gap = Math.max(0, step.bbox.y0 - frame.y1);
      if (best === null || gap < best) best = gap;
    }
    return best;
  }
}
