/**
 * Property-based testing configuration and utilities
 *
 * Shared fast-check settings and arbitraries for moduli, curves and
 * scalars. All property tests should use these configurations to keep the
 * suite consistent.
 */

import * as fc from 'fast-check';
import { CurveGroup } from '../curve/curve-group.js';
import { createPoint } from '../curve/point.js';
import type { FinitePoint } from '../types.js';

/**
 * Standard configuration for property-based tests
 * - 100 iterations per property test
 * - Seed logging for reproducibility
 */
export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for slower properties (full factor searches)
 */
export const FAST_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 20,
  verbose: false,
  seed: Date.now(),
};

/**
 * Mersenne prime 2^61 - 1
 *
 * Over a prime this large a random curve practically never hits a
 * non-invertible denominator, so group-law properties can be checked
 * without the factor path interfering.
 */
export const LARGE_PRIME_MODULUS = (1n << 61n) - 1n;

/**
 * Primes below 100
 */
export const SMALL_PRIMES: readonly bigint[] = [
  2n, 3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n, 41n, 43n, 47n, 53n, 59n, 61n, 67n,
  71n, 73n, 79n, 83n, 89n, 97n,
];

/**
 * A curve group together with a point on it
 */
export interface CurveWithPoint {
  group: CurveGroup;
  point: FinitePoint;
}

/**
 * Arbitrary generator for small primes
 */
export function arbitrarySmallPrime(): fc.Arbitrary<bigint> {
  return fc.constantFrom(...SMALL_PRIMES);
}

/**
 * Arbitrary generator for composite moduli p·q with p, q small primes
 */
export function arbitraryCompositeModulus(): fc.Arbitrary<bigint> {
  return fc.tuple(arbitrarySmallPrime(), arbitrarySmallPrime()).map(([p, q]) => p * q);
}

/**
 * Arbitrary generator for ring elements within a modulus
 * Generates random bigints in range [0, modulus)
 */
export function arbitraryRingValue(modulus: bigint): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 0n, max: modulus - 1n });
}

/**
 * Arbitrary generator for a random curve through a random point
 *
 * Mirrors the search's own curve selection: x0, y0 and a are drawn first
 * and b is derived from them.
 */
export function arbitraryCurveWithPoint(modulus: bigint): fc.Arbitrary<CurveWithPoint> {
  return fc
    .tuple(arbitraryRingValue(modulus), arbitraryRingValue(modulus), arbitraryRingValue(modulus))
    .map(([x0, y0, a]) => ({
      group: CurveGroup.throughPoint(x0, y0, a, modulus),
      point: createPoint(x0, y0),
    }));
}

/**
 * Arbitrary generator for small scalar values (for testing scalar multiplication)
 */
export function arbitrarySmallScalar(): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max: 1000n });
}

/**
 * Arbitrary generator for very small scalars (for naive multiplication tests)
 */
export function arbitraryVerySmallScalar(): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max: 20n });
}
