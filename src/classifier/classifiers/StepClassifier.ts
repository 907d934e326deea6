/**
 * Step Classifier
 *
 * Assembles one Step per winning step number. Each step takes the nearest
 * unclaimed parts list sitting above its number, and the diagram that
 * overlaps most with the region to the right of and below the step.
 */

import { createBBox, intersectionArea, unionAll } from '../../model/BBox';
import type { BBox } from '../../model/BBox';
import { Err, Ok } from '../result';
import type { ClassificationResult } from '../ClassificationResult';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy, Score } from '../types';

/** How far a parts list may run past the top of its step number */
const PARTS_LIST_OVERLAP_TOLERANCE = 2;

export class StepScore implements Score {
  constructor(
    readonly stepNumber: Candidate<'step_number'>,
    readonly partsList: Candidate<'parts_list'> | null,
    readonly diagram: Candidate<'diagram'> | null,
  ) {}

  score(): number {
    return 0.6 + (this.partsList !== null ? 0.2 : 0) + (this.diagram !== null ? 0.2 : 0);
  }
}

export class StepClassifier implements LabelClassifier<'step'> {
  readonly name = 'StepClassifier';
  readonly output = 'step';
  readonly requires: ReadonlySet<Label> = new Set<Label>(['step_number', 'parts_list', 'diagram']);
  readonly removal: RemovalPolicy = { removeChildren: false, removeNearDuplicates: false };

  score(result: ClassificationResult): void {
    const steps = [...result.getWinners('step_number')].sort(
      (a, b) => stepValue(a) - stepValue(b) || a.id - b.id,
    );
    if (steps.length === 0) return;

    const partsLists = pairPartsLists(steps, result.getWinners('parts_list'));
    const diagrams = result.getWinners('diagram');
    const usedDiagrams = new Set<Candidate<'diagram'>>();
    const page = result.pageData.bbox;

    for (const step of steps) {
      const partsList = partsLists.get(step) ?? null;
      const top = partsList !== null ? Math.min(partsList.bbox.y0, step.bbox.y0) : step.bbox.y0;
      const region = createBBox(step.bbox.x0, top, page.x1, page.y1);

      let diagram: Candidate<'diagram'> | null = null;
      let bestOverlap = 0;
      for (const candidate of diagrams) {
        if (usedDiagrams.has(candidate)) continue;
        const overlap = intersectionArea(candidate.bbox, region);
        if (overlap > bestOverlap) {
          diagram = candidate;
          bestOverlap = overlap;
        }
      }
      if (diagram !== null) usedDiagrams.add(diagram);

      const details = new StepScore(step, partsList, diagram);
      const boxes: BBox[] = [step.bbox];
      if (partsList) boxes.push(partsList.bbox);
      if (diagram) boxes.push(diagram.bbox);

      result.addCandidate({
        label: 'step',
        score: details.score(),
        scoreDetails: details,
        sourceBlocks: [],
        bbox: unionAll(boxes),
      });
    }
  }

  build(candidate: Candidate<'step'>): BuildResult<'step'> {
    const details = candidate.scoreDetails;
    if (!(details instanceof StepScore)) return Err('Step candidate is missing its score details');
    const stepNumber = details.stepNumber.constructed;
    if (stepNumber === null) return Err(`Step number #${details.stepNumber.id} was not built`);

    return Ok({
      kind: 'Step',
      bbox: candidate.bbox,
      stepNumber,
      partsList: details.partsList?.constructed ?? null,
      diagram: details.diagram?.constructed ?? null,
    });
  }

  winnerGroup(candidate: Candidate<'step'>): string | null {
    const details = candidate.scoreDetails;
    return details instanceof StepScore ? `step:${stepValue(details.stepNumber)}` : null;
  }
}

function stepValue(candidate: Candidate<'step_number'>): number {
  return candidate.constructed?.value ?? Number.MAX_SAFE_INTEGER;
}

/**
 * One-to-one assignment of parts lists to the step numbers below them,
 * closest pair first. Distance is the vertical gap plus the left-edge offset.
 */
function pairPartsLists(
  steps: readonly Candidate<'step_number'>[],
  partsLists: readonly Candidate<'parts_list'>[],
): Map<Candidate<'step_number'>, Candidate<'parts_list'>> {
  const pairs: Array<{ step: Candidate<'step_number'>; list: Candidate<'parts_list'>; distance: number }> = [];
  for (const step of steps) {
    for (const list of partsLists) {
      if (list.bbox.y1 > step.bbox.y0 + PARTS_LIST_OVERLAP_TOLERANCE) continue;
      const distance = Math.max(0, step.bbox.y0 - list.bbox.y1) + Math.abs(step.bbox.x0 - list.bbox.x0);
      pairs.push({ step, list, distance });
    }
  }
  pairs.sort((a, b) => a.distance - b.distance || a.step.id - b.step.id || a.list.id - b.list.id);

  const assigned = new Map<Candidate<'step_number'>, Candidate<'parts_list'>>();
  const used = new Set<Candidate<'parts_list'>>();
  for (const { step, list } of pairs) {
    if (assigned.has(step) || used.has(list)) continue;
    assigned.set(step, list);
    used.add(list);
  }
  return assigned;
}
