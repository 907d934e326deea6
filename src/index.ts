export * from './model/BBox';
export type * from './model/types';
export type * from './model/elements';
export { iterElements, partsListTotalItems } from './model/elements';
export { buildHierarchy, BlockTree } from './model/HierarchyBuilder';
export type { HasBBox } from './model/HierarchyBuilder';

export { classifyPages, buildManual } from './classifier/DocumentClassifier';
export type { ClassifyPagesOptions, DocumentClassification } from './classifier/DocumentClassifier';
export { ClassificationPipeline } from './classifier/ClassificationPipeline';
export { ClassificationResult } from './classifier/ClassificationResult';
export type { ConsumptionReason, ConsumptionRecord } from './classifier/ConsumptionTracker';
export { ConstraintModel } from './classifier/ConstraintModel';
export type { SolveResult } from './classifier/ConstraintModel';
export { filterDuplicateBlocks } from './classifier/BlockFilter';
export { topologicalSort } from './classifier/TopologicalSort';
export { createDefaultClassifiers } from './classifier/classifiers';
export { buildClassifierHints, emptyHints } from './classifier/hints';
export { loadClassifierConfig, defaultClassifierConfig, ClassifierConfigSchema } from './classifier/ClassifierConfig';
export type { ClassifierConfig, ClassifierConfigInput } from './classifier/ClassifierConfig';
export { ClassifierConfigError, InvariantViolationError } from './classifier/errors';
export { Ok, Err } from './classifier/result';
export type { Result } from './classifier/result';
export { RuleScore, CompositeScore } from './classifier/Score';
export { LABELS, COMPOSITE_LABELS } from './classifier/types';
export type {
  AnyCandidate,
  BuildResult,
  Candidate,
  ClassifierHints,
  Label,
  LabelClassifier,
  LabelElementMap,
  RemovalPolicy,
  Score,
} from './classifier/types';
export { serialize, serializeElement, serializeManual, serializeClassificationResult } from './classifier/Serializer';

export { loadDocument } from './extractor/DocumentLoader';
export type { LoadOptions, LoadedDocument } from './extractor/DocumentLoader';
export { extractPage } from './extractor/PageExtractor';
export type { PdfPageSource, ExtractedPage } from './extractor/PageExtractor';
