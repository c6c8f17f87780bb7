/**
 * Planar point type and the distance math used by the simplifier
 */

export interface Point {
  x: number;
  y: number;
}

// ============================================================================
// Point Operations
// ============================================================================

/**
 * Calculate squared distance (faster when you don't need actual distance)
 */
export function distanceSquared(p1: Point, p2: Point): number {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  return dx * dx + dy * dy;
}

// ============================================================================
// Line Operations
// ============================================================================

/**
 * Squared distance from p to the infinite line through a and b.
 * Falls back to the squared distance from p to a when a and b coincide.
 */
export function perpendicularDistanceSquared(p: Point, a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lineLengthSquared = dx * dx + dy * dy;
  if (lineLengthSquared < Number.MIN_VALUE) return distanceSquared(p, a);

  const numerator = a.x * b.y - b.x * a.y + dx * p.y - dy * p.x;
  return (numerator * numerator) / lineLengthSquared;
}
