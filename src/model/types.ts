/**
 * Primitive Block Types
 *
 * The flat input to classification: one record per text run, vector drawing
 * or placed image, as produced by the extractor (or any other parser that
 * honours the same contract).
 *
 *   PageExtractor (pdfjs) -> PageData -> ClassificationPipeline -> Page
 */

import type { BBox, Point } from './BBox';

/** RGB color with 0-1 range components */
export interface RGB { r: number; g: number; b: number }

/** One segment of a vector path, in page coordinates */
export type PathItem =
  | { op: 'line'; from: Point; to: Point }
  | { op: 'curve'; from: Point; control1: Point; control2: Point; to: Point }
  | { op: 'rect'; bbox: BBox };

interface BlockBase {
  /** Document-unique identity; assigned once at parse time and never reused */
  readonly id: number;
  readonly bbox: BBox;
}

export interface TextBlock extends BlockBase {
  readonly kind: 'text';
  readonly text: string;
  readonly fontName: string | null;
  readonly fontSize: number | null;
}

export interface DrawingBlock extends BlockBase {
  readonly kind: 'drawing';
  readonly fillColor: RGB | null;
  readonly strokeColor: RGB | null;
  readonly lineWidth: number | null;
  readonly items: readonly PathItem[];
  /** Set when the drawing is a clipped image or an image-mask shape */
  readonly imageId: string | null;
}

export interface ImageBlock extends BlockBase {
  readonly kind: 'image';
  readonly imageId: string | null;
}

/** Closed set of primitive elements on a page */
export type Block = TextBlock | DrawingBlock | ImageBlock;

export type BlockKind = Block['kind'];

export interface PageData {
  /** 1-based position of the page in its document */
  readonly pageNumber: number;
  readonly bbox: BBox;
  readonly blocks: readonly Block[];
}
