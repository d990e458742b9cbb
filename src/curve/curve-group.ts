/**
 * Elliptic Curve Group over Z/NZ
 *
 * Affine addition and doubling on y² = x³ + ax + b modulo a composite N.
 * Because Z/NZ is not a field, the slope denominator may share a factor
 * with N. That case is not an error: `tryAdd` reports it as a `factor`
 * result, and `add` records it on the group and answers with the point at
 * infinity.
 */

import type { CurveOperationResult, CurveParameters, FinitePoint, Point } from '../types.js';
import { createDebugLogger } from '../debug.js';
import { gcd, mod, modInverse, ringAdd, ringMul, ringSquare, ringSub } from '../ring/operations.js';
import { INFINITY, createPoint, isInfinity } from './point.js';

const debugLog = createDebugLogger('curve');

/**
 * Wrap a point as a successful operation result
 */
export function pointResult(point: Point): CurveOperationResult {
  return { status: 'point', point };
}

/**
 * Wrap a discovered divisor of N as an operation result
 */
export function factorResult(factor: bigint): CurveOperationResult {
  return { status: 'factor', factor };
}

/**
 * Weierstrass curve group over Z/NZ
 *
 * @example
 * ```typescript
 * const group = CurveGroup.throughPoint(3n, 6n, 2n, 77n);
 * const p = createPoint(3n, 6n);
 * group.add(p, p);          // (10, 22)
 * group.factorHint();       // 1n
 * ```
 */
export class CurveGroup {
  readonly parameters: CurveParameters;
  private lastFactor = 1n;

  constructor(parameters: CurveParameters) {
    const { modulus } = parameters;
    this.parameters = Object.freeze({
      a: mod(parameters.a, modulus),
      b: mod(parameters.b, modulus),
      modulus,
    });
  }

  /**
   * Build the curve with coefficient `a` that passes through (x0, y0)
   *
   * b = y0² − x0³ − a·x0 (mod N)
   */
  static throughPoint(x0: bigint, y0: bigint, a: bigint, modulus: bigint): CurveGroup {
    const b = mod(y0 * y0 - x0 * x0 * x0 - a * x0, modulus);
    return new CurveGroup({ a, b, modulus });
  }

  /**
   * Last divisor of N recorded by a failed operation, or 1 if none
   */
  factorHint(): bigint {
    return this.lastFactor;
  }

  /**
   * Whether some operation on this group has exposed a divisor of N
   */
  isBroken(): boolean {
    return this.lastFactor !== 1n;
  }

  /**
   * Check if a point satisfies y² = x³ + ax + b (mod N)
   */
  contains(point: Point): boolean {
    if (isInfinity(point)) {
      return true;
    }
    const { a, b, modulus: n } = this.parameters;
    const y2 = ringSquare(point.y, n);
    const x3 = ringMul(ringSquare(point.x, n), point.x, n);
    const ax = ringMul(a, point.x, n);
    return y2 === ringAdd(ringAdd(x3, ax, n), b, n);
  }

  /**
   * Add two points without touching the group's state
   *
   * Identity cases return the other argument unchanged.
   */
  tryAdd(p: Point, q: Point): CurveOperationResult {
    if (isInfinity(p)) {
      return pointResult(q);
    }
    if (isInfinity(q)) {
      return pointResult(p);
    }

    const n = this.parameters.modulus;
    const a = this.reduce(p);
    const b = this.reduce(q);

    if (a.x === b.x && a.y === b.y) {
      return this.tryDouble(a);
    }

    const denominator = ringSub(b.x, a.x, n);
    const d = gcd(denominator, n);
    if (d !== 1n) {
      return factorResult(d);
    }

    const slope = ringMul(ringSub(b.y, a.y, n), modInverse(denominator, n), n);
    const x = ringSub(ringSub(ringSquare(slope, n), a.x, n), b.x, n);
    const y = ringSub(ringMul(slope, ringSub(a.x, x, n), n), a.y, n);
    return pointResult(createPoint(x, y));
  }

  /**
   * Add two points, recording any divisor of N that the addition exposes
   *
   * @returns The sum, or INFINITY if the slope denominator was not invertible
   */
  add(p: Point, q: Point): Point {
    return this.resolve(this.tryAdd(p, q));
  }

  /**
   * Double a point, recording any divisor of N that the doubling exposes
   */
  double(p: Point): Point {
    return this.add(p, p);
  }

  /**
   * Collapse an operation result into a point
   *
   * A `factor` result is recorded as the group's factor hint and becomes
   * INFINITY.
   */
  resolve(result: CurveOperationResult): Point {
    if (result.status === 'point') {
      return result.point;
    }
    this.lastFactor = result.factor;
    debugLog('Non-invertible denominator', {
      factor: result.factor.toString(),
      modulus: this.parameters.modulus.toString(),
    });
    return INFINITY;
  }

  private tryDouble(p: FinitePoint): CurveOperationResult {
    const { a, modulus: n } = this.parameters;
    const denominator = ringMul(2n, p.y, n);
    const d = gcd(denominator, n);
    if (d !== 1n) {
      return factorResult(d);
    }

    const numerator = ringAdd(ringMul(3n, ringSquare(p.x, n), n), a, n);
    const slope = ringMul(numerator, modInverse(denominator, n), n);
    const x = ringSub(ringSquare(slope, n), ringMul(2n, p.x, n), n);
    const y = ringSub(ringMul(slope, ringSub(p.x, x, n), n), p.y, n);
    return pointResult(createPoint(x, y));
  }

  private reduce(point: FinitePoint): FinitePoint {
    const n = this.parameters.modulus;
    if (point.x >= 0n && point.x < n && point.y >= 0n && point.y < n) {
      return point;
    }
    return createPoint(mod(point.x, n), mod(point.y, n));
  }

  toString(): string {
    const { a, b, modulus } = this.parameters;
    return `y^2 = x^3 + ${a}x + ${b} (mod ${modulus})`;
  }
}
