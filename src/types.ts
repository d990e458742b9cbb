/**
 * Core type definitions for lenstra-ecm
 *
 * Points, curve parameters and the tagged result that carries either a
 * computed point or a divisor of N discovered while computing it.
 *
 * @module types
 */

/**
 * Affine point (x, y) with coordinates in Z/NZ
 */
export interface FinitePoint {
  readonly kind: 'finite';
  readonly x: bigint;
  readonly y: bigint;
}

/**
 * The point at infinity, identity of the curve group
 */
export interface InfinityPoint {
  readonly kind: 'infinity';
}

/**
 * A curve point: either a coordinate pair or the point at infinity
 *
 * @example
 * ```typescript
 * import { createPoint, INFINITY, isInfinity } from 'lenstra-ecm';
 *
 * const p = createPoint(3n, 6n);
 * if (!isInfinity(p)) {
 *   console.log(p.x, p.y);
 * }
 * ```
 */
export type Point = FinitePoint | InfinityPoint;

/**
 * Weierstrass curve y² = x³ + ax + b over Z/NZ
 */
export interface CurveParameters {
  /** Coefficient 'a' in y² = x³ + ax + b, reduced mod N */
  readonly a: bigint;
  /** Coefficient 'b' in y² = x³ + ax + b, reduced mod N */
  readonly b: bigint;
  /** The modulus N (composite in the interesting case) */
  readonly modulus: bigint;
}

/**
 * Outcome of a group operation over Z/NZ
 *
 * `factor` means a denominator shared the divisor `factor` (> 1) with N, so
 * the operation could not be completed.
 */
export type CurveOperationResult =
  | { readonly status: 'point'; readonly point: Point }
  | { readonly status: 'factor'; readonly factor: bigint };

/**
 * Source of uniformly distributed integers for curve selection
 */
export interface RandomSource {
  /** Uniform integer in the inclusive range [min, max] */
  nextBigInt(min: bigint, max: bigint): bigint;
}

/**
 * Terminal state of a single Lenstra attempt
 *
 * - 'found': the curve broke and exposed a divisor of N
 * - 'exhausted': no divisor was exposed on this curve
 */
export type LenstraStatus = 'found' | 'exhausted';

/**
 * Options for a single Lenstra attempt
 *
 * Every field falls back to the global configuration (see `configure`).
 */
export interface LenstraOptions {
  /** Randomness used to pick the curve and starting point */
  random?: RandomSource;
  /** Largest multiplier i to apply before giving up on the curve */
  maxMultiplier?: number;
  /** Whether to validate the modulus before searching */
  validateInputs?: boolean;
}

/**
 * Detailed outcome of a single Lenstra attempt
 */
export interface LenstraResult {
  /** Divisor of N in (1, N], or 1 when the attempt was exhausted */
  factor: bigint;
  /** Terminal state of the attempt */
  status: LenstraStatus;
  /** Number of scalar multiplications performed */
  multipliers: number;
  /** Curve the attempt ran on */
  curve: CurveParameters;
  /** Starting point (x0, y0) */
  startPoint: Point;
  /** Wall-clock time in milliseconds */
  timeMs: number;
}
