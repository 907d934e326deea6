/**
 * Diagram Classifier
 *
 * Whatever artwork is left once parts, parts lists, bag icons and the
 * background have claimed their blocks: each connected cluster of graphics
 * is one assembly diagram.
 */

import { bboxArea, buildAllConnectedClusters, minDistance, unionAll } from '../../model/BBox';
import { Ok } from '../result';
import { scoreLinear } from '../rules/scoring';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy, Score } from '../types';

const CLUSTER_GAP = 2;

/** Page-area fraction at which a cluster scores fully */
const FULL_SCORE_AREA_RATIO = 0.1;

export class DiagramScore implements Score {
  constructor(readonly areaRatio: number) {}

  score(): number {
    return scoreLinear(this.areaRatio, 0, FULL_SCORE_AREA_RATIO, 0.5, 1);
  }
}

export class DiagramClassifier implements LabelClassifier<'diagram'> {
  readonly name = 'DiagramClassifier';
  readonly output = 'diagram';
  readonly requires: ReadonlySet<Label> = new Set<Label>(['part_image', 'parts_list', 'new_bag', 'background']);
  readonly removal: RemovalPolicy = { removeChildren: true, removeNearDuplicates: true };
  private readonly config: ClassifierConfig['diagram'];

  constructor(config: ClassifierConfig) {
    this.config = config.diagram;
  }

  score(result: ClassificationResult): void {
    const pageArea = bboxArea(result.pageData.bbox);
    if (pageArea <= 0) return;

    const graphics = result.unconsumedBlocks().filter(b => b.kind !== 'text');
    const clusters = buildAllConnectedClusters(graphics, (a, b) => minDistance(a.bbox, b.bbox) <= CLUSTER_GAP);

    for (const cluster of clusters) {
      const ratio = bboxArea(unionAll(cluster.map(b => b.bbox))) / pageArea;
      if (ratio > this.config.maxAreaRatio) continue;

      const details = new DiagramScore(ratio);
      if (details.score() < this.config.minScore) continue;

      result.addCandidate({
        label: 'diagram',
        score: details.score(),
        scoreDetails: details,
        sourceBlocks: cluster,
      });
    }
  }

  build(candidate: Candidate<'diagram'>): BuildResult<'diagram'> {
    return Ok({ kind: 'Diagram', bbox: candidate.bbox });
  }
}
