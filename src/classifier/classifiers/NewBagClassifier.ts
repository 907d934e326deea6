/**
 * New Bag Classifier
 *
 * The "open bag N" callout: a large, square cluster of artwork in the
 * top-left corner, usually with the bag number printed inside it.
 */

import { bboxHeight, bboxWidth, buildAllConnectedClusters, fullyInside, minDistance, overlaps, unionAll } from '../../model/BBox';
import type { BBox } from '../../model/BBox';
import { Err, Ok } from '../result';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy, Score } from '../types';

/** Blocks closer than this belong to the same icon */
const CLUSTER_GAP = 2;

type NewBagConfig = ClassifierConfig['newBag'];

export class NewBagScore implements Score {
  constructor(
    readonly squareness: number,
    readonly bagNumber: Candidate<'bag_number'> | null,
  ) {}

  score(): number {
    return 0.6 + 0.2 * this.squareness + (this.bagNumber !== null ? 0.2 : 0);
  }
}

export class NewBagClassifier implements LabelClassifier<'new_bag'> {
  readonly name = 'NewBagClassifier';
  readonly output = 'new_bag';
  readonly requires: ReadonlySet<Label> = new Set<Label>(['bag_number']);
  readonly removal: RemovalPolicy = { removeChildren: true, removeNearDuplicates: true };
  private readonly config: NewBagConfig;

  constructor(config: ClassifierConfig) {
    this.config = config.newBag;
  }

  score(result: ClassificationResult): void {
    const graphics = result.unconsumedBlocks().filter(b => b.kind !== 'text');
    if (graphics.length === 0) return;

    const bagNumbers = result.getWinners('bag_number');
    const clusters = buildAllConnectedClusters(
      graphics,
      (a, b) => overlaps(a.bbox, b.bbox) || minDistance(a.bbox, b.bbox) <= CLUSTER_GAP,
    );

    for (const cluster of clusters) {
      const bbox = unionAll(cluster.map(b => b.bbox));
      const squareness = this.squareness(bbox, result.pageData.bbox);
      if (squareness === null) continue;

      const bagNumber = bagNumbers.find(n => fullyInside(n.bbox, bbox)) ?? null;
      const details = new NewBagScore(squareness, bagNumber);
      if (details.score() < this.config.minScore) continue;

      result.addCandidate({
        label: 'new_bag',
        score: details.score(),
        scoreDetails: details,
        sourceBlocks: cluster,
      });
    }
  }

  build(candidate: Candidate<'new_bag'>): BuildResult<'new_bag'> {
    const details = candidate.scoreDetails;
    if (!(details instanceof NewBagScore)) return Err('New bag candidate is missing its score details');
    return Ok({ kind: 'NewBag', bbox: candidate.bbox, number: details.bagNumber?.constructed ?? null });
  }

  /**
   * 1 for a perfect square, falling to 0 at the configured aspect limits.
   * Null when the cluster is too small, outside the corner, or not square enough.
   */
  private squareness(bbox: BBox, page: BBox): number | null {
    const c = this.config;
    const width = bboxWidth(bbox);
    const height = bboxHeight(bbox);
    if (Math.min(width, height) < c.iconMinSize) return null;
    if (bbox.x0 > page.x0 + bboxWidth(page) * c.iconMaxXRatio) return null;
    if (bbox.y0 > page.y0 + bboxHeight(page) * c.iconMaxYRatio) return null;

    const aspect = width / height;
    if (aspect < c.iconMinAspect || aspect > c.iconMaxAspect) return null;
    const limit = aspect >= 1 ? c.iconMaxAspect - 1 : 1 - c.iconMinAspect;
    return limit > 0 ? Math.max(0, 1 - Math.abs(aspect - 1) / limit) : 1;
  }
}
