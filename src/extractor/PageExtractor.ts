/**
 * PageExtractor: pdfjs Page to Blocks
 *
 * One pass over a page's operator list yields drawings and images; the
 * text content yields text blocks. Every block gets a document-unique id
 * and a bbox in top-left-origin page points.
 *
 *   page → getTextContent()  → convertTextItems()    → TextBlock[]
 *   page → getOperatorList() → parseOperatorList()   → DrawingBlock[] / ImageBlock[]
 *
 * Clip paths, glyph outlines and image decoding are not attempted.
 */

import { bboxFromPoints, createBBox } from '../model/BBox';
import type { BBox, Point } from '../model/BBox';
import type { Block, DrawingBlock, ImageBlock, PageData, PathItem, RGB, TextBlock } from '../model/types';

// ─── pdfjs-dist OPS constants ─────────────────────────────────────

const OPS = {
  setLineWidth: 2,
  save: 10,
  restore: 11,
  transform: 12,
  moveTo: 13,
  lineTo: 14,
  curveTo: 15,
  curveTo2: 16,
  curveTo3: 17,
  closePath: 18,
  rectangle: 19,
  stroke: 20,
  closeStroke: 21,
  fill: 22,
  eoFill: 23,
  fillStroke: 24,
  eoFillStroke: 25,
  closeFillStroke: 26,
  closeEOFillStroke: 27,
  endPath: 28,
  setStrokeGray: 56,
  setFillGray: 57,
  setStrokeRGBColor: 58,
  setFillRGBColor: 59,
  setStrokeCMYKColor: 60,
  setFillCMYKColor: 61,
  paintFormXObjectBegin: 74,
  paintFormXObjectEnd: 75,
  paintJpegXObject: 82,
  paintImageMaskXObject: 83,
  paintImageXObject: 85,
  paintInlineImageXObject: 86,
  constructPath: 91,
} as const;

// ─── pdfjs Surface ────────────────────────────────────────────────

/** The parts of pdfjs' PDFPageProxy the extractor reads */
export interface PdfPageSource {
  getViewport(params: { scale: number }): { width: number; height: number };
  getOperatorList(): Promise<{ fnArray: readonly number[]; argsArray: readonly unknown[] }>;
  getTextContent(): Promise<{
    items: readonly unknown[];
    styles?: Readonly<Record<string, { fontFamily?: string }>>;
  }>;
}

export interface ExtractedPage {
  pageData: PageData;
  /** First id not used by this page */
  nextId: number;
}

// ─── Affine Matrix Math ───────────────────────────────────────────

/** 6-element affine transform: [a, b, c, d, e, f] */
type Matrix = [number, number, number, number, number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

/** m1 applied first, then m2 */
function multiplyMatrices(m1: Matrix, m2: Matrix): Matrix {
  return [
    m1[0] * m2[0] + m1[1] * m2[2],
    m1[0] * m2[1] + m1[1] * m2[3],
    m1[2] * m2[0] + m1[3] * m2[2],
    m1[2] * m2[1] + m1[3] * m2[3],
    m1[4] * m2[0] + m1[5] * m2[2] + m2[4],
    m1[4] * m2[1] + m1[5] * m2[3] + m2[5],
  ];
}

function applyTransform(point: Point, ctm: Matrix): Point {
  return {
    x: point.x * ctm[0] + point.y * ctm[2] + ctm[4],
    y: point.x * ctm[1] + point.y * ctm[3] + ctm[5],
  };
}

// ─── Argument Helpers ─────────────────────────────────────────────

/** Operator arguments arrive as plain arrays or typed arrays */
function toNumbers(value: unknown): number[] {
  if (Array.isArray(value)) return value.map(v => (typeof v === 'number' ? v : 0));
  if (value instanceof Uint8ClampedArray || value instanceof Float32Array || value instanceof Float64Array) {
    return Array.from(value);
  }
  return [];
}

function toMatrix(value: unknown): Matrix | null {
  const n = toNumbers(value);
  if (n.length < 6 || n.some(v => !Number.isFinite(v))) return null;
  return [n[0], n[1], n[2], n[3], n[4], n[5]];
}

function argsOf(argsArray: readonly unknown[], i: number): unknown[] {
  const args = argsArray[i];
  return Array.isArray(args) ? args : args === null || args === undefined ? [] : [args];
}

// ─── Color Conversion ─────────────────────────────────────────────

function cmykToRgb(c: number, m: number, y: number, k: number): RGB {
  return {
    r: (1 - c) * (1 - k),
    g: (1 - m) * (1 - k),
    b: (1 - y) * (1 - k),
  };
}

/** pdfjs hands RGB over as 0-255 bytes; older builds used 0-1 */
function toRgb(components: number[]): RGB {
  const [r = 0, g = 0, b = 0] = components;
  const scale = r > 1 || g > 1 || b > 1 ? 255 : 1;
  return { r: r / scale, g: g / scale, b: b / scale };
}

const HEX_COLOR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

function parseColor(op: number, args: unknown[]): RGB | null {
  const first = args[0];
  if (typeof first === 'string') {
    const hex = HEX_COLOR.exec(first);
    if (hex === null) return null;
    return { r: parseInt(hex[1], 16) / 255, g: parseInt(hex[2], 16) / 255, b: parseInt(hex[3], 16) / 255 };
  }
  const n = args.length === 1 && typeof first !== 'number' ? toNumbers(first) : toNumbers(args);
  switch (op) {
    case OPS.setFillGray:
    case OPS.setStrokeGray: {
      const g = n[0] ?? 0;
      return toRgb([g, g, g]);
    }
    case OPS.setFillCMYKColor:
    case OPS.setStrokeCMYKColor:
      return cmykToRgb(n[0] ?? 0, n[1] ?? 0, n[2] ?? 0, n[3] ?? 0);
    default:
      return n.length >= 3 ? toRgb(n) : null;
  }
}

// ─── Text ─────────────────────────────────────────────────────────

interface TextItemFields {
  str: string;
  transform: number[];
  width: number;
  height: number;
  fontName: string | null;
}

function readTextItem(item: unknown): TextItemFields | null {
  if (typeof item !== 'object' || item === null) return null;
  if (!('str' in item) || typeof item.str !== 'string') return null;
  if (!('transform' in item)) return null;
  const transform = toNumbers(item.transform);
  if (transform.length < 6) return null;
  return {
    str: item.str,
    transform,
    width: 'width' in item && typeof item.width === 'number' ? item.width : 0,
    height: 'height' in item && typeof item.height === 'number' ? item.height : 0,
    fontName: 'fontName' in item && typeof item.fontName === 'string' ? item.fontName : null,
  };
}

function convertTextItems(
  items: readonly unknown[],
  styles: Readonly<Record<string, { fontFamily?: string }>>,
  pageHeight: number,
  nextId: () => number,
): TextBlock[] {
  const blocks: TextBlock[] = [];

  for (const raw of items) {
    const item = readTextItem(raw);
    if (item === null || !item.str.trim()) continue;

    // Font size from the text matrix: sqrt(a^2 + b^2)
    const [a, b, , , e, f] = item.transform;
    const fontSize = Math.sqrt(a * a + b * b);
    if (!(fontSize > 0) || !Number.isFinite(e) || !Number.isFinite(f)) continue;

    const height = item.height || fontSize;
    const width = item.width || item.str.length * fontSize * 0.5;
    // pdfjs uses a bottom-left origin
    const y1 = pageHeight - f;

    blocks.push({
      kind: 'text',
      id: nextId(),
      bbox: createBBox(e, y1 - height, e + width, y1),
      text: item.str.trim(),
      fontName: item.fontName !== null ? styles[item.fontName]?.fontFamily ?? item.fontName : null,
      fontSize,
    });
  }

  return blocks;
}

// ─── Operator List ────────────────────────────────────────────────

interface GraphicsState {
  fillColor: RGB;
  strokeColor: RGB;
  lineWidth: number;
  ctm: Matrix;
}

function cloneState(state: GraphicsState): GraphicsState {
  return {
    fillColor: { ...state.fillColor },
    strokeColor: { ...state.strokeColor },
    lineWidth: state.lineWidth,
    ctm: [...state.ctm],
  };
}

function parseOperatorList(
  fnArray: readonly number[],
  argsArray: readonly unknown[],
  pageHeight: number,
  nextId: () => number,
): Array<DrawingBlock | ImageBlock> {
  const blocks: Array<DrawingBlock | ImageBlock> = [];
  let state: GraphicsState = {
    fillColor: { r: 0, g: 0, b: 0 },
    strokeColor: { r: 0, g: 0, b: 0 },
    lineWidth: 1,
    ctm: [...IDENTITY],
  };
  const stack: GraphicsState[] = [];

  // Current path, already in page coordinates (top-left origin)
  let items: PathItem[] = [];
  let current: Point | null = null;
  let subpathStart: Point | null = null;

  const toPage = (x: number, y: number): Point => {
    const p = applyTransform({ x, y }, state.ctm);
    return { x: p.x, y: pageHeight - p.y };
  };

  const moveTo = (x: number, y: number) => {
    current = toPage(x, y);
    subpathStart = current;
  };
  const lineTo = (x: number, y: number) => {
    const to = toPage(x, y);
    if (current !== null) items.push({ op: 'line', from: current, to });
    current = to;
  };
  const curveTo = (x1: number, y1: number, x2: number, y2: number, x3: number, y3: number) => {
    const to = toPage(x3, y3);
    const from = current ?? to;
    items.push({ op: 'curve', from, control1: toPage(x1, y1), control2: toPage(x2, y2), to });
    current = to;
  };
  const closePath = () => {
    if (current !== null && subpathStart !== null && (current.x !== subpathStart.x || current.y !== subpathStart.y)) {
      items.push({ op: 'line', from: current, to: subpathStart });
    }
    current = subpathStart;
  };
  const rectangle = (x: number, y: number, w: number, h: number) => {
    items.push({ op: 'rect', bbox: bboxFromPoints([toPage(x, y), toPage(x + w, y + h), toPage(x + w, y), toPage(x, y + h)]) });
    moveTo(x, y);
  };

  /** Untransformed pdf-space point of the current position, for curveTo2 */
  const currentPdfPoint = (): Point => {
    if (current === null) return { x: 0, y: 0 };
    const [a, b, c, d, e, f] = state.ctm;
    const det = a * d - b * c;
    if (det === 0) return { x: 0, y: 0 };
    const px = current.x - e;
    const py = pageHeight - current.y - f;
    return { x: (d * px - c * py) / det, y: (a * py - b * px) / det };
  };

  const applyPathOp = (op: number, n: number[]) => {
    switch (op) {
      case OPS.moveTo:
        moveTo(n[0], n[1]);
        break;
      case OPS.lineTo:
        lineTo(n[0], n[1]);
        break;
      case OPS.curveTo:
        curveTo(n[0], n[1], n[2], n[3], n[4], n[5]);
        break;
      case OPS.curveTo2: {
        // current point doubles as the first control point
        const p = currentPdfPoint();
        curveTo(p.x, p.y, n[0], n[1], n[2], n[3]);
        break;
      }
      case OPS.curveTo3:
        // end point doubles as the second control point
        curveTo(n[0], n[1], n[2], n[3], n[2], n[3]);
        break;
      case OPS.closePath:
        closePath();
        break;
      case OPS.rectangle:
        rectangle(n[0], n[1], n[2], n[3]);
        break;
    }
  };

  const flushPath = (doFill: boolean, doStroke: boolean) => {
    const points: Point[] = [];
    for (const item of items) {
      if (item.op === 'rect') {
        points.push({ x: item.bbox.x0, y: item.bbox.y0 }, { x: item.bbox.x1, y: item.bbox.y1 });
      } else if (item.op === 'line') {
        points.push(item.from, item.to);
      } else {
        points.push(item.from, item.control1, item.control2, item.to);
      }
    }
    if (points.length > 0 && points.every(p => Number.isFinite(p.x) && Number.isFinite(p.y))) {
      blocks.push({
        kind: 'drawing',
        id: nextId(),
        bbox: bboxFromPoints(points),
        fillColor: doFill ? { ...state.fillColor } : null,
        strokeColor: doStroke ? { ...state.strokeColor } : null,
        lineWidth: doStroke ? state.lineWidth : null,
        items,
        imageId: null,
      });
    }
    items = [];
    current = null;
    subpathStart = null;
  };

  const paintImage = (imageId: string | null) => {
    // Images are painted into the unit square, placed by the CTM
    const corners = [toPage(0, 0), toPage(1, 0), toPage(0, 1), toPage(1, 1)];
    if (!corners.every(p => Number.isFinite(p.x) && Number.isFinite(p.y))) return;
    blocks.push({ kind: 'image', id: nextId(), bbox: bboxFromPoints(corners), imageId });
  };

  for (let i = 0; i < fnArray.length; i++) {
    const op = fnArray[i];
    const args = argsOf(argsArray, i);

    switch (op) {
      // ── Graphics state stack ──
      case OPS.save:
        stack.push(cloneState(state));
        break;
      case OPS.restore:
      case OPS.paintFormXObjectEnd:
        state = stack.pop() ?? state;
        break;
      case OPS.paintFormXObjectBegin: {
        stack.push(cloneState(state));
        const matrix = toMatrix(args[0]);
        if (matrix !== null) state.ctm = multiplyMatrices(matrix, state.ctm);
        break;
      }
      case OPS.transform: {
        const matrix = toMatrix(args);
        if (matrix !== null) state.ctm = multiplyMatrices(matrix, state.ctm);
        break;
      }
      case OPS.setLineWidth:
        state.lineWidth = toNumbers(args)[0] ?? state.lineWidth;
        break;

      // ── Color ──
      case OPS.setFillRGBColor:
      case OPS.setFillGray:
      case OPS.setFillCMYKColor:
        state.fillColor = parseColor(op, args) ?? state.fillColor;
        break;
      case OPS.setStrokeRGBColor:
      case OPS.setStrokeGray:
      case OPS.setStrokeCMYKColor:
        state.strokeColor = parseColor(op, args) ?? state.strokeColor;
        break;

      // ── Path construction ──
      case OPS.constructPath: {
        const ops = toNumbers(args[0]);
        const coords = toNumbers(args[1]);
        let k = 0;
        for (const pathOp of ops) {
          const arity = PATH_OP_ARITY.get(pathOp) ?? 0;
          applyPathOp(pathOp, coords.slice(k, k + arity));
          k += arity;
        }
        break;
      }
      case OPS.moveTo:
      case OPS.lineTo:
      case OPS.curveTo:
      case OPS.curveTo2:
      case OPS.curveTo3:
      case OPS.closePath:
      case OPS.rectangle:
        applyPathOp(op, toNumbers(args));
        break;

      // ── Path painting ──
      case OPS.stroke:
        flushPath(false, true);
        break;
      case OPS.closeStroke:
        closePath();
        flushPath(false, true);
        break;
      case OPS.fill:
      case OPS.eoFill:
        flushPath(true, false);
        break;
      case OPS.fillStroke:
      case OPS.eoFillStroke:
        flushPath(true, true);
        break;
      case OPS.closeFillStroke:
      case OPS.closeEOFillStroke:
        closePath();
        flushPath(true, true);
        break;
      case OPS.endPath:
        items = [];
        current = null;
        subpathStart = null;
        break;

      // ── Images ──
      case OPS.paintImageXObject:
      case OPS.paintJpegXObject:
        paintImage(typeof args[0] === 'string' ? args[0] : null);
        break;
      case OPS.paintImageMaskXObject:
      case OPS.paintInlineImageXObject:
        paintImage(null);
        break;
    }
  }

  return blocks;
}

const PATH_OP_ARITY: ReadonlyMap<number, number> = new Map([
  [OPS.moveTo, 2],
  [OPS.lineTo, 2],
  [OPS.curveTo, 6],
  [OPS.curveTo2, 4],
  [OPS.curveTo3, 4],
  [OPS.closePath, 0],
  [OPS.rectangle, 4],
]);

// ─── Public API ───────────────────────────────────────────────────

/**
 * Extract the blocks of one page. Ids are assigned from `firstId` upward,
 * text first, then graphics in paint order.
 */
export async function extractPage(page: PdfPageSource, pageNumber: number, firstId: number): Promise<ExtractedPage> {
  const viewport = page.getViewport({ scale: 1 });
  const [opList, textContent] = await Promise.all([page.getOperatorList(), page.getTextContent()]);

  let id = firstId;
  const nextId = () => id++;

  const blocks: Block[] = [
    ...convertTextItems(textContent.items, textContent.styles ?? {}, viewport.height, nextId),
    ...parseOperatorList(opList.fnArray, opList.argsArray, viewport.height, nextId),
  ];
  const bbox: BBox = createBBox(0, 0, viewport.width, viewport.height);

  return { pageData: { pageNumber, bbox, blocks }, nextId: id };
}

export const _testExports = {
  OPS,
  multiplyMatrices,
  toRgb,
  convertTextItems,
  parseOperatorList,
};
