/**
 * Classifier Type Definitions
 *
 * Labels, candidates and the contract every per-label classifier implements:
 *   score (emit candidates) -> build (construct elements) -> select (winners)
 */

import type { BBox } from '../model/BBox';
import type { Block, PageData } from '../model/types';
import type {
  Background,
  BagNumber,
  Diagram,
  Divider,
  NewBag,
  Page,
  PageNumber,
  Part,
  PartCount,
  PartImage,
  PartNumber,
  PartsList,
  PieceLength,
  ProgressBar,
  Step,
  StepNumber,
} from '../model/elements';
import type { Result } from './result';
import type { ClassificationResult } from './ClassificationResult';
import type { ConstraintModel } from './ConstraintModel';
import type { FontSizeHints } from './hints/FontSizeHints';
import type { PageHints } from './hints/PageHints';

// ─── Labels ──────────────────────────────────────────────────

/** The element each label produces */
export interface LabelElementMap {
  page_number: PageNumber;
  step_number: StepNumber;
  part_count: PartCount;
  part_number: PartNumber;
  piece_length: PieceLength;
  part_image: PartImage;
  part: Part;
  parts_list: PartsList;
  progress_bar: ProgressBar;
  bag_number: BagNumber;
  new_bag: NewBag;
  background: Background;
  divider: Divider;
  diagram: Diagram;
  step: Step;
  page: Page;
}

export type Label = keyof LabelElementMap;

export const LABELS: readonly Label[] = [
  'page_number',
  'step_number',
  'part_count',
  'part_number',
  'piece_length',
  'part_image',
  'part',
  'parts_list',
  'progress_bar',
  'bag_number',
  'new_bag',
  'background',
  'divider',
  'diagram',
  'step',
  'page',
];

/** Labels synthesized from already-won elements; their candidates own no blocks */
export const COMPOSITE_LABELS: ReadonlySet<Label> = new Set<Label>(['part', 'step', 'page']);

// ─── Scores ──────────────────────────────────────────────────

/**
 * Score detail attached to a candidate. Only the combined value is part of
 * the contract; implementations carry whatever they need for debugging or
 * for their classifier's build step.
 */
export interface Score {
  score(): number;
}

// ─── Candidates ──────────────────────────────────────────────

export interface Candidate<L extends Label = Label> {
  /** Unique within one page's ClassificationResult, in creation order */
  readonly id: number;
  readonly label: L;
  readonly bbox: BBox;
  /** Combined score in [0, 1] */
  readonly score: number;
  readonly scoreDetails: Score;
  readonly sourceBlocks: readonly Block[];
  constructed: LabelElementMap[L] | null;
  failureReason: string | null;
  isWinner: boolean;
}

export interface CandidateInit<L extends Label> {
  label: L;
  score: number;
  scoreDetails: Score;
  sourceBlocks: readonly Block[];
  /** Required for composite labels; defaults to the union of the source blocks */
  bbox?: BBox;
}

/** Candidate of any label, discriminated on `label` */
export type AnyCandidate = { [L in Label]: Candidate<L> }[Label];

// ─── Hints & Rule Context ────────────────────────────────────

/** Whole-document statistics, computed once and shared read-only by every page */
export interface ClassifierHints {
  readonly fontSizes: FontSizeHints;
  readonly pages: PageHints;
}

export interface RuleContext {
  readonly pageData: PageData;
  readonly hints: ClassifierHints;
}

// ─── Classifier Contract ─────────────────────────────────────

/** What else a winner claims beyond its own source blocks */
export interface RemovalPolicy {
  /** Unconsumed blocks fully inside the winner's bbox */
  removeChildren: boolean;
  /** Unconsumed blocks whose IoU with the winner exceeds the near-duplicate threshold */
  removeNearDuplicates: boolean;
}

export type BuildResult<L extends Label> = Result<LabelElementMap[L], string>;

export interface LabelClassifier<L extends Label = Label> {
  readonly name: string;
  readonly output: L;
  /** Labels whose winners this classifier reads */
  readonly requires: ReadonlySet<Label>;
  readonly removal: RemovalPolicy;

  /** Emit candidates for `output` into the result. */
  score(result: ClassificationResult): void;

  /** Construct the element for a candidate. Must not mutate the result. */
  build(candidate: Candidate<L>, result: ClassificationResult): BuildResult<L>;

  /**
   * Candidates sharing a group key compete: at most one of them wins.
   * Null (or no method) means the candidate competes only for its blocks.
   */
  winnerGroup?(candidate: Candidate<L>): string | null;

  /**
   * Opt in to page-wide constraint solving for this label. Called at the
   * solver barrier with every eligible candidate of the label.
   */
  declareConstraints?(
    model: ConstraintModel,
    candidates: readonly Candidate<L>[],
    result: ClassificationResult,
  ): void;
}
