/**
 * Point Representation
 *
 * Points are immutable affine coordinate pairs or the point at infinity.
 * There is no arithmetic here: everything that depends on the modulus lives
 * in CurveGroup.
 */

import type { FinitePoint, InfinityPoint, Point } from '../types.js';

/**
 * The point at infinity (group identity)
 */
export const INFINITY: InfinityPoint = Object.freeze({ kind: 'infinity' as const });

/**
 * Create an affine point from coordinates
 */
export function createPoint(x: bigint, y: bigint): FinitePoint {
  return Object.freeze({ kind: 'finite' as const, x, y });
}

/**
 * Type guard for the point at infinity
 */
export function isInfinity(point: Point): point is InfinityPoint {
  return point.kind === 'infinity';
}

/**
 * Type guard for a coordinate pair
 */
export function isFinitePoint(point: Point): point is FinitePoint {
  return point.kind === 'finite';
}

/**
 * Check if two points are equal
 *
 * Both at infinity, or both finite with equal coordinates.
 */
export function pointsEqual(a: Point, b: Point): boolean {
  switch (a.kind) {
    case 'infinity':
      return b.kind === 'infinity';
    case 'finite':
      return b.kind === 'finite' && a.x === b.x && a.y === b.y;
  }
}

/**
 * Human-readable form, "O" for infinity
 */
export function pointToString(point: Point): string {
  if (isInfinity(point)) {
    return 'O';
  }
  return `(${point.x}, ${point.y})`;
}
