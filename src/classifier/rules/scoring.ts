/**
 * Scoring helpers shared by rules and classifiers.
 */

/**
 * Triangular score peaking at `ideal`.
 * 0 outside [min, max], linear ramps on each side of the peak.
 */
export function scoreTriangular(value: number, min: number, ideal: number, max: number): number {
  if (value < min || value > max) return 0;
  if (value < ideal) {
    if (ideal === min) return 1;
    return (value - min) / (ideal - min);
  }
  if (max === ideal) return 1;
  return 1 - (value - ideal) / (max - ideal);
}

/**
 * Linear ramp from `minScore` at `min` to `maxScore` at `max`, clamped outside.
 */
export function scoreLinear(
  value: number,
  min: number,
  max: number,
  minScore = 0,
  maxScore = 1,
): number {
  if (value <= min) return minScore;
  if (value >= max) return maxScore;
  const fraction = (value - min) / (max - min);
  return minScore + fraction * (maxScore - minScore);
}

/** exp(-value / scale) */
export function scoreExponentialDecay(value: number, scale: number): number {
  return Math.exp(-value / scale);
}

export type ScaleFunction = (value: number) => number;

/**
 * Piecewise-linear scale through `[value, score]` points, clamped to the end
 * points outside their range. Points may be given in any order.
 *
 *   createLinearScale([[0, 1], [10, 0]])            // descending
 *   createLinearScale([[5, 0], [10, 1], [15, 0]])   // triangle
 */
export function createLinearScale(points: ReadonlyArray<readonly [number, number]>): ScaleFunction {
  if (points.length < 2) {
    throw new RangeError('A linear scale needs at least 2 points');
  }
  const sorted = [...points].sort((a, b) => a[0] - b[0]);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];

  return (value: number): number => {
    if (value <= first[0]) return first[1];
    if (value >= last[0]) return last[1];
    for (let i = 0; i < sorted.length - 1; i++) {
      const [v0, s0] = sorted[i];
      const [v1, s1] = sorted[i + 1];
      if (value >= v0 && value <= v1) {
        if (v1 === v0) return s1;
        return s0 + ((value - v0) / (v1 - v0)) * (s1 - s0);
      }
    }
    return last[1];
  };
}

/** Triangle scale centred on `target`: 0 at half and at one and a half times the target. */
export function fontSizeTriangle(target: number): ScaleFunction {
  return createLinearScale([
    [target * 0.5, 0],
    [target, 1],
    [target * 1.5, 0],
  ]);
}
