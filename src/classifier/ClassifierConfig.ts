/**
 * Classifier Configuration
 *
 * Thresholds and rule weights per label. Every field has a default, so
 * `loadClassifierConfig({})` yields the stock configuration and a JSON file
 * only needs to name the values it overrides.
 */

import { z } from 'zod';
import { ClassifierConfigError } from './errors';

const minScore = (value: number) => z.number().min(0).max(1).default(value);
const weight = (value: number) => z.number().min(0).default(value);
const positive = (value: number) => z.number().positive().default(value);

// ─── Per-Label Sections ──────────────────────────────────────

const PageNumberConfigSchema = z.object({
  minScore: minScore(0.5),
  textWeight: weight(0.7),
  positionWeight: weight(0.3),
  positionScale: positive(50),
  pageValueWeight: weight(1.0),
  fontSizeWeight: weight(0.1),
  /** Bottom fraction of the page searched for page numbers */
  bottomBandRatio: z.number().min(0).max(1).default(0.1),
});

const StepNumberConfigSchema = z.object({
  minScore: minScore(0.5),
  textWeight: weight(0.7),
  fontSizeWeight: weight(0.3),
});

const PartCountConfigSchema = z.object({
  minScore: minScore(0.5),
  textWeight: weight(0.7),
  fontSizeWeight: weight(0.3),
  /** Used when the document gives no part-count size */
  defaultFontSize: positive(10),
});

const PartNumberConfigSchema = z.object({
  minScore: minScore(0.5),
  textWeight: weight(1.0),
  fontSizeWeight: weight(0.5),
});

const BagNumberConfigSchema = z.object({
  minScore: minScore(0.5),
  textWeight: weight(0.4),
  positionWeight: weight(0.4),
  fontSizeWeight: weight(0.2),
  topLeftRatio: z.number().min(0).max(1).default(0.5),
});

const PartsListConfigSchema = z.object({
  minScore: minScore(0.5),
  partsWeight: weight(0.5),
  proximityWeight: weight(0.5),
  proximityScale: positive(100),
  /** Largest drawing, as a fraction of the page area, that can frame a parts list */
  maxAreaRatio: z.number().min(0).max(1).default(0.75),
});

const PartImageConfigSchema = z.object({
  minScore: minScore(0.5),
  maxGap: positive(10),
  alignmentTolerance: positive(3),
});

const PartsConfigSchema = z.object({
  minScore: minScore(0.5),
  partNumberMaxGap: positive(10),
});

const PieceLengthConfigSchema = z.object({
  minScore: minScore(0.5),
});

const ProgressBarConfigSchema = z.object({
  minScore: minScore(0.6),
  maxBottomMarginRatio: z.number().min(0).max(1).default(0.2),
  maxPageNumberProximityRatio: z.number().min(0).max(1).default(0.3),
  pageNumberProximityMultiplier: positive(1.2),
  minWidthRatio: z.number().min(0).max(1).default(0.4),
  maxScoreWidthRatio: z.number().min(0).max(1).default(0.8),
  minAspectRatio: positive(3),
  idealAspectRatio: positive(10),
  overlapMargin: positive(5),
});

const BackgroundConfigSchema = z.object({
  minScore: minScore(0.5),
  minCoverageRatio: z.number().min(0).max(1).default(0.85),
  edgeTolerance: positive(5),
});

const DividerConfigSchema = z.object({
  minScore: minScore(0.5),
  minLengthRatio: z.number().min(0).max(1).default(0.4),
  maxThickness: positive(5),
  edgeMargin: positive(5),
});

const NewBagConfigSchema = z.object({
  minScore: minScore(0.5),
  iconMinSize: positive(180),
  iconMinAspect: positive(0.9),
  iconMaxAspect: positive(1.1),
  iconMaxXRatio: z.number().min(0).max(1).default(0.15),
  iconMaxYRatio: z.number().min(0).max(1).default(0.15),
});

const DiagramConfigSchema = z.object({
  minScore: minScore(0.6),
  maxAreaRatio: z.number().min(0).max(1).default(0.95),
});

// ─── Root ────────────────────────────────────────────────────

export const ClassifierConfigSchema = z.object({
  useConstraintSolver: z.boolean().default(true),
  /** Branch-and-bound node budget per connected component of the model */
  solverNodeLimit: z.number().int().positive().default(100_000),
  /** IoU at or above which two same-kind blocks are duplicates */
  duplicateIouThreshold: z.number().min(0).max(1).default(0.8),
  /** IoU above which an unconsumed block is claimed by a winner */
  nearDuplicateIouThreshold: z.number().min(0).max(1).default(0.7),
  debug: z.boolean().default(false),
  strictInvariants: z.boolean().default(() => process.env.NODE_ENV !== 'production'),

  pageNumber: PageNumberConfigSchema.default({}),
  stepNumber: StepNumberConfigSchema.default({}),
  partCount: PartCountConfigSchema.default({}),
  partNumber: PartNumberConfigSchema.default({}),
  bagNumber: BagNumberConfigSchema.default({}),
  partsList: PartsListConfigSchema.default({}),
  partImage: PartImageConfigSchema.default({}),
  parts: PartsConfigSchema.default({}),
  pieceLength: PieceLengthConfigSchema.default({}),
  progressBar: ProgressBarConfigSchema.default({}),
  background: BackgroundConfigSchema.default({}),
  divider: DividerConfigSchema.default({}),
  newBag: NewBagConfigSchema.default({}),
  diagram: DiagramConfigSchema.default({}),
});

export type ClassifierConfig = z.infer<typeof ClassifierConfigSchema>;
export type ClassifierConfigInput = z.input<typeof ClassifierConfigSchema>;

/**
 * Validate and fill defaults. Throws ClassifierConfigError listing every
 * zod issue as `path: message`.
 */
export function loadClassifierConfig(input: unknown = {}): ClassifierConfig {
  const parsed = ClassifierConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ClassifierConfigError('invalid-config', `Invalid classifier config: ${issues}`);
  }
  return parsed.data;
}

export function defaultClassifierConfig(): ClassifierConfig {
  return loadClassifierConfig({});
}
