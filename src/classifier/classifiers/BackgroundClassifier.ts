/**
 * Background Classifier
 *
 * A drawing or image covering most of the page, edge to edge.
 */

import { bboxArea, intersectionArea } from '../../model/BBox';
import type { DrawingBlock } from '../../model/types';
import { Ok } from '../result';
import type { Rule } from '../rules/Rule';
import { scoreLinear } from '../rules/scoring';
import type { ClassifierConfig } from '../ClassifierConfig';
import type { BuildResult, Candidate, RemovalPolicy } from '../types';
import { RuleBasedClassifier } from './RuleBasedClassifier';

export class BackgroundClassifier extends RuleBasedClassifier<'background'> {
  readonly name = 'BackgroundClassifier';
  readonly output = 'background';
  // Everything on the page sits inside the background
  readonly removal: RemovalPolicy = { removeChildren: false, removeNearDuplicates: true };
  protected readonly rules: readonly Rule[];
  protected readonly minScore: number;

  constructor(config: ClassifierConfig) {
    super();
    const c = config.background;
    this.minScore = c.minScore;
    this.rules = [
      {
        name: 'is_graphic',
        weight: 0,
        required: true,
        calculate: block => (block.kind === 'text' ? 0 : 1),
      },
      {
        name: 'coverage',
        weight: 0.7,
        required: true,
        calculate(block, ctx) {
          const pageArea = bboxArea(ctx.pageData.bbox);
          if (pageArea <= 0) return 0;
          const coverage = intersectionArea(block.bbox, ctx.pageData.bbox) / pageArea;
          if (coverage < c.minCoverageRatio) return 0;
          return scoreLinear(coverage, c.minCoverageRatio, 1, 0.5, 1);
        },
      },
      {
        name: 'edges',
        weight: 0.3,
        required: false,
        calculate(block, ctx) {
          const page = ctx.pageData.bbox;
          const b = block.bbox;
          const touching = [
            Math.abs(b.x0 - page.x0) <= c.edgeTolerance,
            Math.abs(b.y0 - page.y0) <= c.edgeTolerance,
            Math.abs(b.x1 - page.x1) <= c.edgeTolerance,
            Math.abs(b.y1 - page.y1) <= c.edgeTolerance,
          ].filter(Boolean).length;
          return touching / 4;
        },
      },
    ];
  }

  build(candidate: Candidate<'background'>): BuildResult<'background'> {
    const drawings = candidate.sourceBlocks.filter((b): b is DrawingBlock => b.kind === 'drawing');
    const fillColor = drawings.find(d => d.fillColor !== null)?.fillColor ?? null;
    return Ok({ kind: 'Background', bbox: candidate.bbox, fillColor });
  }

  winnerGroup(): string {
    return 'background';
  }
}
