/**
 * Integration Tests: Classification Pipeline
 *
 * Whole pages through the stock classifier set, plus the wiring checks the
 * pipeline runs when it is constructed.
 */
import { describe, test, expect, vi } from 'vitest';
import { createBBox } from '../../model/BBox';
import { ClassificationPipeline } from '../ClassificationPipeline';
import type { ClassificationResult } from '../ClassificationResult';
import type { ClassifierConfig, ClassifierConfigInput } from '../ClassifierConfig';
import type { ConstraintModel } from '../ConstraintModel';
import { ClassifierConfigError, InvariantViolationError } from '../errors';
import { emptyHints } from '../hints';
import { Ok } from '../result';
import { RuleScore } from '../Score';
import type { BuildResult, Candidate, Label, LabelClassifier, RemovalPolicy } from '../types';
import { PageNumberClassifier, ProgressBarClassifier, createDefaultClassifiers } from '../classifiers';
import { makeConfig, makeImage, makePage, makeStackedFramePage, makeStepPage, makeText } from '../../test/factories';

const NO_REMOVAL: RemovalPolicy = { removeChildren: false, removeNearDuplicates: false };

function makePipeline(overrides: ClassifierConfigInput = {}) {
  const config = makeConfig(overrides);
  return new ClassificationPipeline(createDefaultClassifiers(config), config);
}

function sourceIds(result: ClassificationResult, label: Label): number[][] {
  return result.getWinners(label).map(c => c.sourceBlocks.map(b => b.id));
}

/** No block is a source of two winners, and every winner owns its sources. */
function expectConsistentWinners(result: ClassificationResult): void {
  const owners = new Map<number, number>();
  for (const candidate of result.allCandidates()) {
    if (!candidate.isWinner) continue;
    for (const block of candidate.sourceBlocks) {
      expect(owners.get(block.id)).toBeUndefined();
      owners.set(block.id, candidate.id);
      expect(result.getConsumption(block)).toMatchObject({ reason: 'won', candidateId: candidate.id });
    }
  }
  expect(result.checkInvariants()).toEqual([]);
}

/** Claims the "note" text as a divider without consuming it */
class RogueDividerClassifier implements LabelClassifier<'divider'> {
  readonly name = 'RogueDividerClassifier';
  readonly output = 'divider';
  readonly requires: ReadonlySet<Label> = new Set<Label>();
  readonly removal = NO_REMOVAL;

  score(result: ClassificationResult): void {
    const note = result.pageData.blocks.find(b => b.kind === 'text' && b.text === 'note');
    if (note === undefined) return;
    const candidate = result.addCandidate({
      label: 'divider',
      score: 1,
      scoreDetails: new RuleScore({}, 1),
      sourceBlocks: [note],
    });
    candidate.isWinner = true;
  }

  build(candidate: Candidate<'divider'>): BuildResult<'divider'> {
    return Ok({ kind: 'Divider', bbox: candidate.bbox, orientation: 'horizontal' });
  }
}

/** Solver-managed, but reads a label produced after the solver barrier */
class LateBagNumberClassifier implements LabelClassifier<'bag_number'> {
  readonly name = 'LateBagNumberClassifier';
  readonly output = 'bag_number';
  readonly requires: ReadonlySet<Label> = new Set<Label>(['progress_bar']);
  readonly removal = NO_REMOVAL;

  score(): void {}

  build(candidate: Candidate<'bag_number'>): BuildResult<'bag_number'> {
    return Ok({ kind: 'BagNumber', bbox: candidate.bbox, value: 1 });
  }

  declareConstraints(): void {}
}

/**
 * Bag callouts over the texts "a" and "b": one wide candidate over both
 * (0.9) and one per text (0.6 each). With `contradictory`, exactly one of
 * the narrow ones must be selected, yet each forces the other.
 */
class CalloutClassifier implements LabelClassifier<'bag_number'> {
  readonly name = 'CalloutClassifier';
  readonly output = 'bag_number';
  readonly requires: ReadonlySet<Label> = new Set<Label>();
  readonly removal = NO_REMOVAL;

  constructor(private readonly contradictory = false) {}

  score(result: ClassificationResult): void {
    const texts = result.pageData.blocks.filter(b => b.kind === 'text' && (b.text === 'a' || b.text === 'b'));
    const add = (score: number, sourceBlocks: typeof texts) =>
      result.addCandidate({ label: 'bag_number', score, scoreDetails: new RuleScore({}, score), sourceBlocks });
    add(0.9, texts);
    for (const text of texts) add(0.6, [text]);
  }

  build(candidate: Candidate<'bag_number'>): BuildResult<'bag_number'> {
    return Ok({ kind: 'BagNumber', bbox: candidate.bbox, value: 1 });
  }

  declareConstraints(model: ConstraintModel, candidates: readonly Candidate<'bag_number'>[]): void {
    if (!this.contradictory) return;
    const [a, b] = candidates.filter(c => c.sourceBlocks.length === 1);
    model.exactlyOneOf([a, b]);
    model.ifSelectedThen(a, b);
    model.ifSelectedThen(b, a);
  }
}

function makeCalloutPage() {
  return makePage([makeText(1, [20, 20, 30, 30], 'a'), makeText(2, [40, 20, 50, 30], 'b')]);
}

function withRogueDivider(config: ClassifierConfig): LabelClassifier[] {
  return createDefaultClassifiers(config).map(c => (c.output === 'divider' ? new RogueDividerClassifier() : c));
}

describe('ClassificationPipeline construction', () => {
  test('solver-managed labels are selected before progress bars are scored', () => {
    const pipeline = makePipeline();
    expect(pipeline.solverLabels).toEqual(
      new Set(['page_number', 'step_number', 'part_count', 'part_number', 'bag_number']),
    );
    expect(pipeline.barrierIndex).toBe(6);
    expect(pipeline.classifiers[6].name).toBe('ProgressBarClassifier');
  });

  test('without the solver every label is selected greedily', () => {
    const pipeline = makePipeline({ useConstraintSolver: false });
    expect(pipeline.solverLabels.size).toBe(0);
    expect(pipeline.barrierIndex).toBeNull();
  });

  test('a missing requirement fails at construction', () => {
    const config = makeConfig();
    const classifiers = createDefaultClassifiers(config).filter(c => c.output !== 'diagram');
    expect(() => new ClassificationPipeline(classifiers, config)).toThrow(ClassifierConfigError);
    expect(() => new ClassificationPipeline(classifiers, config)).toThrow(
      "Classifier 'StepClassifier' requires label 'diagram' which no registered classifier produces",
    );
  });

  test('a solver-managed classifier after the barrier is rejected', () => {
    const config = makeConfig();
    const classifiers = [new PageNumberClassifier(config), new ProgressBarClassifier(config), new LateBagNumberClassifier()];
    expect(() => new ClassificationPipeline(classifiers, config)).toThrow(
      "Solver-managed classifier 'LateBagNumberClassifier' runs after 'ProgressBarClassifier', which reads solver-managed labels",
    );
  });
});

describe('ClassificationPipeline.classify', () => {
  test('a step page classifies end to end', () => {
    const page = makeStepPage();
    const result = makePipeline().classify(page, emptyHints());

    expect(page.blocks.map(b => result.getLabel(b))).toEqual([
      'page_number',
      'step_number',
      'parts_list',
      'part_image',
      'part_image',
      'part_count',
      'part_count',
      'diagram',
    ]);
    expect(result.getWinners('page_number')[0].score).toBeCloseTo(0.9648, 4);
    expect(result.getWinners('step_number')[0].score).toBe(1);
    expect(result.getWinners('parts_list')[0].score).toBeCloseTo(0.5 + 0.5 * Math.exp(-0.5), 10);
    for (const label of ['progress_bar', 'divider', 'new_bag', 'background'] as const) {
      expect(result.getWinners(label)).toEqual([]);
    }

    const built = result.page;
    expect(built?.categories).toEqual(['instruction']);
    expect(built?.pageNumber?.value).toBe(6);
    const [step, ...otherSteps] = built?.steps ?? [];
    expect(otherSteps).toEqual([]);
    expect(step.stepNumber.value).toBe(10);
    expect(step.partsList?.parts.map(p => [p.count.count, p.diagram?.imageId])).toEqual([
      [2, 'img_1'],
      [5, 'img_2'],
    ]);
    expect(step.diagram?.bbox).toEqual(createBBox(120, 20, 190, 100));

    expect(result.warnings).toEqual([]);
    expectConsistentWinners(result);
  });

  test('greedy selection reaches the same labels', () => {
    const page = makeStepPage();
    const withSolver = makePipeline().classify(page, emptyHints());
    const greedy = makePipeline({ useConstraintSolver: false }).classify(page, emptyHints());

    expect(page.blocks.map(b => greedy.getLabel(b))).toEqual(page.blocks.map(b => withSolver.getLabel(b)));
    expectConsistentWinners(greedy);
  });

  test('the outer of two stacked frames wins and claims the inner one', () => {
    const page = makeStackedFramePage();
    const result = makePipeline().classify(page, emptyHints());

    expect(sourceIds(result, 'parts_list')).toEqual([[4]]);
    const inner = result.getCandidates('parts_list').find(c => c.sourceBlocks[0].id === 3);
    expect(inner?.isWinner).toBe(false);
    expect(inner?.failureReason).toBe("Source block 3 removed as child-of-winner of 'parts_list'");
    expect(result.getConsumption(page.blocks[2])).toMatchObject({ reason: 'child-of-winner', targetBlockId: 4 });
    expect(result.getLabel(page.blocks[2])).toBeNull();

    expect(result.page?.steps.map(s => s.partsList?.bbox ?? null)).toEqual([createBBox(10, 20, 110, 101), null]);
    expect(result.warnings).toEqual(['Page 1: step 2 has no parts list above it']);
    expectConsistentWinners(result);
  });

  test('a page-sized background image does not hide the step number', () => {
    const page = makePage([...makeStepPage().blocks, makeImage(100, [0, 0, 200, 300], 'bg')], 6);
    const result = makePipeline().classify(page, emptyHints());

    expect(sourceIds(result, 'background')).toEqual([[100]]);
    expect(sourceIds(result, 'step_number')).toEqual([[2]]);
    expect(result.page?.steps.map(s => s.stepNumber.value)).toEqual([10]);
    expect(result.warnings).toEqual([]);
    expectConsistentWinners(result);
  });

  test('a step numeral printed inside artwork leaves the page without steps, with a warning', () => {
    const page = makePage(
      [
        makeText(1, [185, 285, 195, 295], '6', { fontSize: 12 }),
        makeImage(2, [5, 140, 60, 190], 'art'),
        makeText(3, [10, 150, 40, 180], '10', { fontSize: 30 }),
        makeText(4, [15, 58, 27, 68], '2x', { fontSize: 10 }),
        makeText(5, [60, 58, 72, 68], '5×', { fontSize: 10 }),
      ],
      6,
    );
    const result = makePipeline().classify(page, emptyHints());

    expect(result.getCandidates('step_number')).toEqual([]);
    expect(sourceIds(result, 'part_count')).toEqual([[4], [5]]);
    expect(result.page?.steps).toEqual([]);
    expect(result.warnings).toEqual(['Page 6: no steps found']);
  });

  test('pre-consumed duplicates never become candidates', () => {
    const page = makeStackedFramePage();
    const result = makePipeline().classify(page, emptyHints(), new Map([[3, 4], [99, 4]]));

    expect(result.getConsumption(page.blocks[2])).toEqual({
      blockId: 3,
      reason: 'duplicate',
      candidateId: null,
      targetBlockId: 4,
    });
    expect(result.getCandidates('parts_list').map(c => c.sourceBlocks[0].id)).toEqual([4]);
  });

  test('a page without a page number is warned about', () => {
    const page = makePage([makeText(1, [20, 20, 180, 40], 'Welcome', { fontSize: 20 })], 3);
    const result = makePipeline().classify(page, emptyHints());

    expect(result.warnings).toEqual(['Page 3: missing page number']);
    expect(result.page?.categories).toEqual(['info']);
  });

  test('broken invariants throw in strict mode', () => {
    const config = makeConfig();
    const pipeline = new ClassificationPipeline(withRogueDivider(config), config);
    const page = makePage([...makeStepPage().blocks, makeText(9, [150, 150, 190, 160], 'note')], 6);

    expect(() => pipeline.classify(page, emptyHints())).toThrow(InvariantViolationError);
    expect(() => pipeline.classify(page, emptyHints())).toThrow(
      /Block 9 is a source of winner #\d+ but was never consumed/,
    );
  });

  test('broken invariants become warnings otherwise', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = makeConfig({ strictInvariants: false });
    const pipeline = new ClassificationPipeline(withRogueDivider(config), config);
    const page = makePage([...makeStepPage().blocks, makeText(9, [150, 150, 190, 160], 'note')], 6);

    const result = pipeline.classify(page, emptyHints());
    const [rogue] = result.getCandidates('divider');
    const message = `Page 6: invariant violated: Block 9 is a source of winner #${rogue.id} but was never consumed`;
    expect(result.warnings).toEqual([message]);
    expect(warn).toHaveBeenCalledWith(`[ClassificationPipeline] ${message}`);
    warn.mockRestore();
  });

  test('debug mode logs each classifier', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    makePipeline({ debug: true }).classify(makeStepPage(), emptyHints());

    expect(log).toHaveBeenCalledWith('[ClassificationPipeline] Page 6: DiagramClassifier -> 1 candidate(s), 1 winner(s)');
    log.mockRestore();
  });
});

describe('ClassificationPipeline solver selection', () => {
  test('two texts reading the same step number leave one winner', () => {
    const page = makePage([
      makeText(1, [185, 285, 195, 295], '1', { fontSize: 12 }),
      makeText(2, [10, 150, 30, 175], '5', { fontSize: 25 }),
      makeText(3, [120, 150, 140, 175], '5', { fontSize: 25 }),
    ]);
    const result = makePipeline().classify(page, emptyHints());

    const [first, second] = result.getCandidates('step_number');
    expect(first.score).toBe(second.score);
    expect(first.isWinner).toBe(true);
    expect(first.sourceBlocks[0].id).toBe(2);
    expect(second.isWinner).toBe(false);
    expect(second.failureReason).toBe('Not selected by constraint solver');
    expect(result.page?.steps.map(s => s.stepNumber.value)).toEqual([5]);
    expectConsistentWinners(result);
  });

  test('two compatible candidates beat the single best one', () => {
    const config = makeConfig();
    const result = new ClassificationPipeline([new CalloutClassifier()], config).classify(makeCalloutPage(), emptyHints());

    const [wide, ...narrow] = result.getCandidates('bag_number');
    expect(sourceIds(result, 'bag_number')).toEqual([[1], [2]]);
    expect(wide.isWinner).toBe(false);
    expect(wide.failureReason).toBe("Lost conflict to 'bag_number' (score=0.600)");
    expect(narrow.every(c => c.isWinner)).toBe(true);
    expectConsistentWinners(result);
  });

  test('greedy selection takes the single best one instead', () => {
    const config = makeConfig({ useConstraintSolver: false });
    const result = new ClassificationPipeline([new CalloutClassifier()], config).classify(makeCalloutPage(), emptyHints());

    expect(sourceIds(result, 'bag_number')).toEqual([[1, 2]]);
  });

  test('an infeasible model falls back to greedy selection with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = makeConfig();
    const result = new ClassificationPipeline([new CalloutClassifier(true)], config).classify(
      makeCalloutPage(),
      emptyHints(),
    );

    const message = 'Page 1: constraint solver found no feasible selection for some candidates; using greedy selection for them';
    expect(sourceIds(result, 'bag_number')).toEqual([[1, 2]]);
    expect(result.warnings).toEqual([message, 'Page 1: missing page number']);
    expect(warn).toHaveBeenCalledWith(`[ClassificationPipeline] ${message}`);
    warn.mockRestore();
  });

  test('hitting the node limit warns and still selects every label', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const page = makeStepPage();
    const result = makePipeline({ solverNodeLimit: 1 }).classify(page, emptyHints());
    const reference = makePipeline().classify(page, emptyHints());

    expect(page.blocks.map(b => result.getLabel(b))).toEqual(page.blocks.map(b => reference.getLabel(b)));
    expect(result.warnings).toEqual(['Page 6: constraint solver hit its node limit; selection may not be optimal']);
    expectConsistentWinners(result);
    warn.mockRestore();
  });
});
