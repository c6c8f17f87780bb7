/**
 * Ramer-Douglas-Peucker simplification for 2D polylines.
 *
 * Points are read through caller-supplied accessors, so any point
 * representation works. Distances are compared squared, and the
 * divide-and-conquer walk runs on an explicit stack of index ranges.
 */

import type { Point } from "./geometry.ts";
import { perpendicularDistanceSquared } from "./geometry.ts";

/** Reads one coordinate from a caller-typed point. */
export type CoordinateAccessor<T> = (point: T) => number;

function assertArguments<T>(
  points: readonly T[],
  getX: CoordinateAccessor<T>,
  getY: CoordinateAccessor<T>,
): void {
  if (!Array.isArray(points)) {
    throw new TypeError("points must be an array");
  }
  if (typeof getX !== "function") {
    throw new TypeError("getX must be a function");
  }
  if (typeof getY !== "function") {
    throw new TypeError("getY must be a function");
  }
}

function isUsableEpsilon(epsilon: number): boolean {
  return Number.isFinite(epsilon) && epsilon > 0;
}

/**
 * Mark the points that survive simplification of points[0..n-1].
 */
function markRetained<T>(
  points: readonly T[],
  epsilonSquared: number,
  getX: CoordinateAccessor<T>,
  getY: CoordinateAccessor<T>,
): Uint8Array {
  const n = points.length;
  const keep = new Uint8Array(n);
  keep[0] = 1;
  keep[n - 1] = 1;

  // Pairs of [start, end], pushed flat
  const stack: number[] = [0, n - 1];

  while (stack.length > 0) {
    const end = stack.pop() ?? 0;
    const start = stack.pop() ?? 0;
    if (end - start < 2) continue;

    const x1 = getX(points[start]);
    const y1 = getY(points[start]);
    const x2 = getX(points[end]);
    const y2 = getY(points[end]);

    const dx = x2 - x1;
    const dy = y2 - y1;
    const lineLengthSquared = dx * dx + dy * dy;

    let maxDistanceSquared = 0;
    let maxIndex = start;

    if (lineLengthSquared < Number.MIN_VALUE) {
      // Endpoints coincide: measure against the anchor point instead
      for (let i = start + 1; i < end; i++) {
        const px = getX(points[i]) - x1;
        const py = getY(points[i]) - y1;
        const distSquared = px * px + py * py;
        if (distSquared > maxDistanceSquared) {
          maxDistanceSquared = distSquared;
          maxIndex = i;
        }
      }
    } else {
      const crossTerm = x1 * y2 - x2 * y1;
      for (let i = start + 1; i < end; i++) {
        const px = getX(points[i]);
        const py = getY(points[i]);
        const numerator = crossTerm + dx * py - dy * px;
        const distSquared = (numerator * numerator) / lineLengthSquared;
        if (distSquared > maxDistanceSquared) {
          maxDistanceSquared = distSquared;
          maxIndex = i;
        }
      }
    }

    if (maxDistanceSquared > epsilonSquared) {
      keep[maxIndex] = 1;
      stack.push(start, maxIndex, maxIndex, end);
    }
  }

  return keep;
}

/**
 * Indices of the points kept by Douglas-Peucker, in ascending order.
 * Fewer than 3 points, or an epsilon that is not a positive finite
 * number, keeps every index.
 */
export function simplifyIndices<T>(
  points: readonly T[],
  epsilon: number,
  getX: CoordinateAccessor<T>,
  getY: CoordinateAccessor<T>,
): number[] {
  assertArguments(points, getX, getY);

  if (points.length < 3 || !isUsableEpsilon(epsilon)) {
    return points.map((_, i) => i);
  }

  const keep = markRetained(points, epsilon * epsilon, getX, getY);
  const indices: number[] = [];
  for (let i = 0; i < keep.length; i++) {
    if (keep[i]) indices.push(i);
  }
  return indices;
}

/**
 * Simplify a polyline with Douglas-Peucker.
 * @param points Ordered polyline points; never mutated
 * @param epsilon Maximum allowed perpendicular deviation
 * @param getX Reads the x coordinate of a point
 * @param getY Reads the y coordinate of a point
 * @returns A new array holding a subsequence of points, endpoints included
 */
export function simplify<T>(
  points: readonly T[],
  epsilon: number,
  getX: CoordinateAccessor<T>,
  getY: CoordinateAccessor<T>,
): T[] {
  return simplifyIndices(points, epsilon, getX, getY).map((i) => points[i]);
}

/**
 * Simplify {x, y} points.
 */
export function simplifyPoints(points: readonly Point[], epsilon: number): Point[] {
  return simplify(points, epsilon, (p) => p.x, (p) => p.y);
}

/**
 * Largest perpendicular distance of any dropped point from the segment
 * of kept points spanning it. Zero when nothing was dropped.
 */
export function maxDeviation(points: readonly Point[], keptIndices: readonly number[]): number {
  let maxSq = 0;
  for (let k = 1; k < keptIndices.length; k++) {
    const a = points[keptIndices[k - 1]];
    const b = points[keptIndices[k]];
    for (let i = keptIndices[k - 1] + 1; i < keptIndices[k]; i++) {
      maxSq = Math.max(maxSq, perpendicularDistanceSquared(points[i], a, b));
    }
  }
  return Math.sqrt(maxSq);
}
