/**
 * BBox: Axis-Aligned Bounding Box Geometry
 *
 * Page coordinates in PDF points with a top-left origin (y grows downward),
 * the same convention the extractor uses when it flips pdfjs output.
 *
 * Boxes are plain frozen-shape records; every operation returns a new value.
 */

// ─── Types ───────────────────────────────────────────────────

export interface BBox {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

export interface Point {
  x: number;
  y: number;
}

// ─── Constants ───────────────────────────────────────────────

/** Gap below which two edges count as touching */
const ADJACENCY_TOLERANCE = 1e-6;

// ─── Construction ────────────────────────────────────────────

/**
 * Create a bounding box. Throws a RangeError unless x0 <= x1 and y0 <= y1
 * (NaN coordinates fail the same check).
 */
export function createBBox(x0: number, y0: number, x1: number, y1: number): BBox {
  if (!(x0 <= x1) || !(y0 <= y1)) {
    throw new RangeError(`Invalid bbox (${x0}, ${y0}, ${x1}, ${y1}): expected x0 <= x1 and y0 <= y1`);
  }
  return { x0, y0, x1, y1 };
}

/** Smallest box covering a set of points. Throws on an empty list. */
export function bboxFromPoints(points: readonly Point[]): BBox {
  if (points.length === 0) {
    throw new RangeError('Cannot build a bbox from zero points');
  }
  let x0 = Infinity;
  let y0 = Infinity;
  let x1 = -Infinity;
  let y1 = -Infinity;
  for (const p of points) {
    x0 = Math.min(x0, p.x);
    y0 = Math.min(y0, p.y);
    x1 = Math.max(x1, p.x);
    y1 = Math.max(y1, p.y);
  }
  return createBBox(x0, y0, x1, y1);
}

// ─── Derived Values ──────────────────────────────────────────

export function bboxWidth(b: BBox): number {
  return b.x1 - b.x0;
}

export function bboxHeight(b: BBox): number {
  return b.y1 - b.y0;
}

export function bboxArea(b: BBox): number {
  return bboxWidth(b) * bboxHeight(b);
}

export function bboxCenter(b: BBox): Point {
  return { x: (b.x0 + b.x1) / 2, y: (b.y0 + b.y1) / 2 };
}

// ─── Predicates ──────────────────────────────────────────────

export function bboxEquals(a: BBox, b: BBox, tolerance = 0): boolean {
  return (
    Math.abs(a.x0 - b.x0) <= tolerance &&
    Math.abs(a.y0 - b.y0) <= tolerance &&
    Math.abs(a.x1 - b.x1) <= tolerance &&
    Math.abs(a.y1 - b.y1) <= tolerance
  );
}

/** Strict overlap: the shared region has positive area. */
export function overlaps(a: BBox, b: BBox): boolean {
  return a.x0 < b.x1 && a.x1 > b.x0 && a.y0 < b.y1 && a.y1 > b.y0;
}

/** Inclusive containment: `inner` lies within `outer`, edges may coincide. */
export function fullyInside(inner: BBox, outer: BBox): boolean {
  return inner.x0 >= outer.x0 && inner.y0 >= outer.y0 && inner.x1 <= outer.x1 && inner.y1 <= outer.y1;
}

export function overlapsHorizontal(a: BBox, b: BBox): boolean {
  return a.x0 < b.x1 && b.x0 < a.x1;
}

export function overlapsVertical(a: BBox, b: BBox): boolean {
  return a.y0 < b.y1 && b.y0 < a.y1;
}

/**
 * Boxes touch along an edge (within tolerance) without overlapping,
 * and share some extent along the other axis.
 */
export function adjacent(a: BBox, b: BBox, tolerance = ADJACENCY_TOLERANCE): boolean {
  if (overlaps(a, b)) return false;
  const touchX =
    (Math.abs(a.x1 - b.x0) <= tolerance || Math.abs(b.x1 - a.x0) <= tolerance) &&
    a.y0 <= b.y1 + tolerance && b.y0 <= a.y1 + tolerance;
  const touchY =
    (Math.abs(a.y1 - b.y0) <= tolerance || Math.abs(b.y1 - a.y0) <= tolerance) &&
    a.x0 <= b.x1 + tolerance && b.x0 <= a.x1 + tolerance;
  return touchX || touchY;
}

// ─── Combination ─────────────────────────────────────────────

export function intersectionArea(a: BBox, b: BBox): number {
  const w = Math.min(a.x1, b.x1) - Math.max(a.x0, b.x0);
  const h = Math.min(a.y1, b.y1) - Math.max(a.y0, b.y0);
  if (w <= 0 || h <= 0) return 0;
  return w * h;
}

/** Shared region, or null when the boxes are disjoint. Touching boxes yield a degenerate box. */
export function intersect(a: BBox, b: BBox): BBox | null {
  const x0 = Math.max(a.x0, b.x0);
  const y0 = Math.max(a.y0, b.y0);
  const x1 = Math.min(a.x1, b.x1);
  const y1 = Math.min(a.y1, b.y1);
  if (x0 > x1 || y0 > y1) return null;
  return createBBox(x0, y0, x1, y1);
}

/** Intersection over union; 0 when the boxes do not overlap or the union is empty. */
export function iou(a: BBox, b: BBox): number {
  const inter = intersectionArea(a, b);
  if (inter === 0) return 0;
  const union = bboxArea(a) + bboxArea(b) - inter;
  if (union <= 0) return 0;
  return inter / union;
}

/** Euclidean gap between the closest edges; 0 when the boxes touch or overlap. */
export function minDistance(a: BBox, b: BBox): number {
  const dx = Math.max(0, b.x0 - a.x1, a.x0 - b.x1);
  const dy = Math.max(0, b.y0 - a.y1, a.y0 - b.y1);
  return Math.hypot(dx, dy);
}

export function union(a: BBox, b: BBox): BBox {
  return createBBox(Math.min(a.x0, b.x0), Math.min(a.y0, b.y0), Math.max(a.x1, b.x1), Math.max(a.y1, b.y1));
}

export function unionAll(boxes: readonly BBox[]): BBox {
  if (boxes.length === 0) {
    throw new RangeError('Cannot compute the union of zero bboxes');
  }
  return boxes.reduce(union);
}

/** Clip to `bounds`; null when nothing of the box lies inside. */
export function clipTo(b: BBox, bounds: BBox): BBox | null {
  return intersect(b, bounds);
}

/** Grow (or shrink, with a negative margin) on all four sides. */
export function expand(b: BBox, margin: number): BBox {
  return createBBox(b.x0 - margin, b.y0 - margin, b.x1 + margin, b.y1 + margin);
}

export function formatBBox(b: BBox): string {
  return `(${b.x0.toFixed(1)},${b.y0.toFixed(1)},${b.x1.toFixed(1)},${b.y1.toFixed(1)})`;
}

// ─── Clustering ──────────────────────────────────────────────

/**
 * Grow a cluster from `seed` by repeatedly pulling in items connected to any
 * member. Members keep the order of `items`.
 */
export function buildConnectedCluster<T>(
  seed: T,
  items: readonly T[],
  isConnected: (a: T, b: T) => boolean,
): T[] {
  const inCluster = new Set<T>([seed]);
  const queue: T[] = [seed];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const item of items) {
      if (inCluster.has(item)) continue;
      if (isConnected(current, item)) {
        inCluster.add(item);
        queue.push(item);
      }
    }
  }

  const ordered = items.filter(item => inCluster.has(item));
  return items.includes(seed) ? ordered : [seed, ...ordered];
}

/** Partition `items` into connected clusters, in order of each cluster's first member. */
export function buildAllConnectedClusters<T>(
  items: readonly T[],
  isConnected: (a: T, b: T) => boolean,
): T[][] {
  const assigned = new Set<T>();
  const clusters: T[][] = [];
  for (const item of items) {
    if (assigned.has(item)) continue;
    const cluster = buildConnectedCluster(item, items, isConnected);
    for (const member of cluster) assigned.add(member);
    clusters.push(cluster);
  }
  return clusters;
}
