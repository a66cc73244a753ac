// Diagnostic Kernel - Ternary geometry (v1)
//
// Percentage normalization and the barycentric-to-Cartesian projection used by
// every Duval triangle. The plotting plane is a 100-unit equilateral triangle:
//   A = (0, 0)            100% of gas 1
//   B = (100, 0)          100% of gas 2
//   C = (50, 50*sqrt(3))  100% of gas 3
//
// Which gas maps to which axis is decided by the caller.

import type { CartesianPointV1, PercentageTripleV1 } from "@dga/contracts";

const SQRT3 = Math.sqrt(3);

/**
 * Normalized triple plus the pre-normalization sum.
 */
export interface NormalizedTripleV1 {
  p1: number;
  p2: number;
  p3: number;
  total: number;
  zero_total: boolean;
}

/**
 * Sum of non-negative values, capped at Number.MAX_VALUE instead of
 * overflowing to Infinity.
 */
export function saturatingSum(values: ReadonlyArray<number>): number {
  let sum = 0;
  for (const v of values) sum += v;
  return Math.min(sum, Number.MAX_VALUE);
}

/**
 * Expresses three concentrations as percentages of their sum.
 *
 * A zero sum yields (0, 0, 0) with `zero_total` set; otherwise the three
 * percentages sum to 100 up to floating-point rounding, for any finite inputs.
 */
export function normalizeTriple(g1: number, g2: number, g3: number): NormalizedTripleV1 {
  const max = Math.max(g1, g2, g3);
  if (max === 0) {
    return { p1: 0, p2: 0, p3: 0, total: 0, zero_total: true };
  }
  // Scaled by the largest gas so the intermediate sum stays in [1, 3].
  const s1 = g1 / max;
  const s2 = g2 / max;
  const s3 = g3 / max;
  const s = s1 + s2 + s3;
  return {
    p1: (s1 / s) * 100,
    p2: (s2 / s) * 100,
    p3: (s3 / s) * 100,
    total: saturatingSum([g1, g2, g3]),
    zero_total: false
  };
}

export function toPercentageTriple(n: NormalizedTripleV1): PercentageTripleV1 {
  return [n.p1, n.p2, n.p3];
}

/**
 * Projects a percentage triple onto the plotting plane.
 *
 * Only p2 and p3 are read; p1 is implied by p1 = 100 - p2 - p3.
 */
export function toCartesian(_p1: number, p2: number, p3: number): CartesianPointV1 {
  return {
    x: p2 + p3 / 2,
    y: (p3 * SQRT3) / 2
  };
}

export function projectTriple(t: Readonly<PercentageTripleV1>): CartesianPointV1 {
  return toCartesian(t[0], t[1], t[2]);
}

/**
 * Unweighted centroid (arithmetic mean of the vertices). Used as a label anchor,
 * not the area centroid.
 */
export function centroid(points: ReadonlyArray<CartesianPointV1>): CartesianPointV1 {
  if (points.length === 0) return { x: 0, y: 0 };
  let sx = 0;
  let sy = 0;
  for (const p of points) {
    sx += p.x;
    sy += p.y;
  }
  return { x: sx / points.length, y: sy / points.length };
}

/**
 * Corners of the plotting triangle in axis order (gas 1, gas 2, gas 3).
 */
export const TRIANGLE_FRAME_V1 = Object.freeze([
  toCartesian(100, 0, 0),
  toCartesian(0, 100, 0),
  toCartesian(0, 0, 100)
] as const);
