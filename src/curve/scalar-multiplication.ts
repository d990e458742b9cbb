/**
 * Scalar Multiplication over Z/NZ
 *
 * Binary double-and-add on top of CurveGroup. The doublings
 * P, 2P, ..., 2^(m-1)P are built first (m = bit length of k), then the ones
 * selected by the set bits of k are summed into an accumulator that starts
 * at infinity. The first operation that exposes a divisor of N ends the
 * computation.
 */

import type { CurveOperationResult, Point } from '../types.js';
import { bitLength } from '../ring/operations.js';
import { validateScalar } from '../validation.js';
import { INFINITY, isInfinity } from './point.js';
import { type CurveGroup, pointResult } from './curve-group.js';

/**
 * Compute k·P without touching the group's state
 *
 * @param group - Curve the point lives on
 * @param point - Base point (INFINITY is returned as is)
 * @param scalar - Positive multiplier
 * @throws EcmError (INVALID_SCALAR) if scalar < 1
 */
export function tryScalarMultiply(
  group: CurveGroup,
  point: Point,
  scalar: bigint
): CurveOperationResult {
  validateScalar(scalar);

  if (isInfinity(point)) {
    return pointResult(INFINITY);
  }

  const m = bitLength(scalar);
  const powersOfTwo: Point[] = [point];
  let current: Point = point;
  for (let i = 1; i < m; i++) {
    const doubled = group.tryAdd(current, current);
    if (doubled.status === 'factor') {
      return doubled;
    }
    current = doubled.point;
    powersOfTwo.push(current);
  }

  let accumulator: Point = INFINITY;
  let bits = scalar;
  for (const power of powersOfTwo) {
    if (bits & 1n) {
      const sum = group.tryAdd(accumulator, power);
      if (sum.status === 'factor') {
        return sum;
      }
      accumulator = sum.point;
    }
    bits >>= 1n;
  }

  return pointResult(accumulator);
}

/**
 * Compute k·P, recording any divisor of N exposed along the way
 *
 * @returns k·P, or INFINITY once the group has recorded a factor
 */
export function scalarMultiply(group: CurveGroup, point: Point, scalar: bigint): Point {
  return group.resolve(tryScalarMultiply(group, point, scalar));
}
