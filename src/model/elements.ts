/**
 * Structured Element Types
 *
 * The output vocabulary of classification. Every element owns exactly one
 * bounding box and, for composites, owns its children by value.
 */

import type { BBox } from './BBox';
import type { RGB } from './types';

// ─── Leaf Elements ─────────────────────────────────────────────

export interface PageNumber {
  kind: 'PageNumber';
  bbox: BBox;
  /** Printed page number, >= 0 */
  value: number;
}

export interface StepNumber {
  kind: 'StepNumber';
  bbox: BBox;
  /** Printed step number, > 0 */
  value: number;
}

/** Which document-wide font-size hint a part count matched best */
export type PartCountHint = 'part_count' | 'catalog_part_count';

export interface PartCount {
  kind: 'PartCount';
  bbox: BBox;
  /** Quantity printed as "2x", >= 0 */
  count: number;
  matchedHint: PartCountHint | null;
}

export interface PartNumber {
  kind: 'PartNumber';
  bbox: BBox;
  /** Catalog element id, 4-8 digits without a leading zero */
  elementId: string;
}

/** Stud-length marker drawn inside a part image */
export interface PieceLength {
  kind: 'PieceLength';
  bbox: BBox;
  value: number;
}

export interface PartImage {
  kind: 'PartImage';
  bbox: BBox;
  imageId: string | null;
}

export interface ProgressBar {
  kind: 'ProgressBar';
  bbox: BBox;
  /** Filled fraction in [0, 1], when an indicator segment was found */
  progress: number | null;
  fullWidth: number;
}

export interface BagNumber {
  kind: 'BagNumber';
  bbox: BBox;
  value: number;
}

export interface Background {
  kind: 'Background';
  bbox: BBox;
  fillColor: RGB | null;
}

export interface Divider {
  kind: 'Divider';
  bbox: BBox;
  orientation: 'horizontal' | 'vertical';
}

export interface Diagram {
  kind: 'Diagram';
  bbox: BBox;
}

// ─── Composite Elements ────────────────────────────────────────

export interface Part {
  kind: 'Part';
  bbox: BBox;
  count: PartCount;
  diagram: PartImage | null;
  number: PartNumber | null;
  length: PieceLength | null;
}

export interface PartsList {
  kind: 'PartsList';
  bbox: BBox;
  parts: Part[];
}

export interface NewBag {
  kind: 'NewBag';
  bbox: BBox;
  number: BagNumber | null;
}

export interface Step {
  kind: 'Step';
  bbox: BBox;
  stepNumber: StepNumber;
  partsList: PartsList | null;
  diagram: Diagram | null;
}

export type PageCategory = 'instruction' | 'catalog' | 'info';

export interface Page {
  kind: 'Page';
  bbox: BBox;
  /** Sorted, without duplicates */
  categories: PageCategory[];
  pageNumber: PageNumber | null;
  progressBar: ProgressBar | null;
  background: Background | null;
  dividers: Divider[];
  newBags: NewBag[];
  steps: Step[];
  /** Loose parts on catalog pages (not inside any parts list) */
  catalog: Part[];
}

export interface Manual {
  kind: 'Manual';
  pages: Page[];
}

export type StructuredElement =
  | PageNumber
  | StepNumber
  | PartCount
  | PartNumber
  | PieceLength
  | PartImage
  | ProgressBar
  | BagNumber
  | Background
  | Divider
  | Diagram
  | Part
  | PartsList
  | NewBag
  | Step
  | Page;

// ─── Helpers ───────────────────────────────────────────────────

/** Sum of part counts in a parts list */
export function partsListTotalItems(list: PartsList): number {
  return list.parts.reduce((sum, part) => sum + part.count.count, 0);
}

function childrenOf(element: StructuredElement): StructuredElement[] {
  switch (element.kind) {
    case 'Part': {
      const children: StructuredElement[] = [element.count];
      if (element.diagram) children.push(element.diagram);
      if (element.number) children.push(element.number);
      if (element.length) children.push(element.length);
      return children;
    }
    case 'PartsList':
      return element.parts;
    case 'NewBag':
      return element.number ? [element.number] : [];
    case 'Step': {
      const children: StructuredElement[] = [element.stepNumber];
      if (element.partsList) children.push(element.partsList);
      if (element.diagram) children.push(element.diagram);
      return children;
    }
    case 'Page': {
      const children: StructuredElement[] = [];
      if (element.pageNumber) children.push(element.pageNumber);
      if (element.progressBar) children.push(element.progressBar);
      if (element.background) children.push(element.background);
      children.push(...element.dividers, ...element.newBags, ...element.steps, ...element.catalog);
      return children;
    }
    default:
      return [];
  }
}

/** Depth-first, pre-order walk over an element and everything it owns. */
export function* iterElements(element: StructuredElement): Generator<StructuredElement> {
  yield element;
  for (const child of childrenOf(element)) {
    yield* iterElements(child);
  }
}
