/**
 * Tests for a single Lenstra attempt
 *
 * Fixed random sequences replay an attempt step by step; seeded sources
 * drive the end-to-end and property checks.
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fc from 'fast-check';
import {
  FAST_PROPERTY_TEST_CONFIG,
  arbitraryCompositeModulus,
} from '../test-utils/property-test-config.js';
import { lenstraAttempt, lenstraAttemptWithMetadata } from './search.js';
import {
  createSeededRandomSource,
  createSequenceRandomSource,
  cryptoRandomSource,
} from './random.js';
import { configure, resetConfig } from '../config.js';
import { createPoint, pointsEqual } from '../curve/point.js';
import { EcmError, ErrorCode } from '../errors.js';
import type { RandomSource } from '../types.js';

const N = 455839n; // 599 × 761

/**
 * Retry with fresh randomness until a proper divisor appears
 */
function findProperDivisor(n: bigint, sourceFor: (attempt: number) => RandomSource): bigint {
  for (let attempt = 1; attempt <= 40; attempt++) {
    const d = lenstraAttempt(n, { random: sourceFor(attempt) });
    if (d !== 1n && d !== n) {
      return d;
    }
  }
  return 1n;
}

describe('Lenstra search', () => {
  afterEach(() => {
    resetConfig();
  });

  describe('deterministic replay', () => {
    it('finds 11 on y² = x³ + 2x + 3 mod 77 at the third multiplier', () => {
      // x0 = 3, y0 = 6, a = 2: P, then 2P = (10, 22), then doubling 2P needs 1/44
      const result = lenstraAttemptWithMetadata(77n, {
        random: createSequenceRandomSource([3n, 6n, 2n]),
      });

      expect(result.factor).toBe(11n);
      expect(result.status).toBe('found');
      expect(result.multipliers).toBe(3);
      expect(result.curve).toEqual({ a: 2n, b: 3n, modulus: 77n });
      expect(pointsEqual(result.startPoint, createPoint(3n, 6n))).toBe(true);
      expect(result.timeMs).toBeGreaterThanOrEqual(0);
    });

    it('finds 2 for N = 6 as soon as a point is doubled', () => {
      const result = lenstraAttemptWithMetadata(6n, {
        random: createSequenceRandomSource([1n, 1n, 1n]),
      });

      expect(result.factor).toBe(2n);
      expect(result.multipliers).toBe(2);
      expect(result.curve).toEqual({ a: 1n, b: 5n, modulus: 6n });
    });

    it('repeats an attempt exactly for the same seed', () => {
      const first = lenstraAttemptWithMetadata(N, { random: createSeededRandomSource(2024) });
      const second = lenstraAttemptWithMetadata(N, { random: createSeededRandomSource(2024) });

      expect(second.factor).toBe(first.factor);
      expect(second.multipliers).toBe(first.multipliers);
      expect(second.curve).toEqual(first.curve);
      expect(pointsEqual(second.startPoint, first.startPoint)).toBe(true);
    });
  });

  describe('end to end', () => {
    it('splits 455839 with seeded curves', () => {
      const d = findProperDivisor(N, (attempt) => createSeededRandomSource(attempt));
      expect([599n, 761n]).toContain(d);
    });

    it('splits 455839 with the default random source', () => {
      const d = findProperDivisor(N, () => cryptoRandomSource);
      expect([599n, 761n]).toContain(d);
    });

    it('should return a divisor in {1, 2, 3, 6} for N = 6', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 1_000_000 }), (seed) => {
          const d = lenstraAttempt(6n, { random: createSeededRandomSource(seed) });
          return [1n, 2n, 3n, 6n].includes(d);
        }),
        FAST_PROPERTY_TEST_CONFIG
      );
    });

    it('should only return divisors of N (factor validity)', () => {
      fc.assert(
        fc.property(arbitraryCompositeModulus(), fc.integer({ min: 0, max: 1_000_000 }), (n, seed) => {
          const result = lenstraAttemptWithMetadata(n, { random: createSeededRandomSource(seed) });
          return result.status === 'found' && result.factor > 1n && n % result.factor === 0n;
        }),
        FAST_PROPERTY_TEST_CONFIG
      );
    });

    it('returns N itself for a prime modulus', () => {
      expect(lenstraAttempt(101n, { random: createSeededRandomSource(7) })).toBe(101n);
    });
  });

  describe('multiplier bound', () => {
    it('reports exhaustion when the bound is reached first', () => {
      const result = lenstraAttemptWithMetadata(N, {
        random: createSeededRandomSource(1),
        maxMultiplier: 1,
      });

      expect(result.factor).toBe(1n);
      expect(result.status).toBe('exhausted');
      expect(result.multipliers).toBe(1);
    });

    it('takes the bound from the global configuration', () => {
      configure({ maxMultiplier: 1, random: createSeededRandomSource(5) });
      expect(lenstraAttempt(N)).toBe(1n);
    });

    it('lets per-call options override the global configuration', () => {
      configure({ maxMultiplier: 1 });
      const factor = lenstraAttempt(77n, {
        random: createSequenceRandomSource([3n, 6n, 2n]),
        maxMultiplier: 10,
      });
      expect(factor).toBe(11n);
    });

    it('rejects a bound that is not a positive integer', () => {
      for (const maxMultiplier of [0, -1, 1.5]) {
        try {
          lenstraAttempt(77n, { maxMultiplier });
          expect.fail('Should have thrown');
        } catch (error) {
          expect(error).toBeInstanceOf(EcmError);
          expect((error as EcmError).code).toBe(ErrorCode.INVALID_CONFIG);
        }
      }
    });
  });

  describe('input validation', () => {
    it('rejects moduli below 2', () => {
      for (const n of [1n, 0n, -15n]) {
        try {
          lenstraAttempt(n);
          expect.fail('Should have thrown');
        } catch (error) {
          expect(error).toBeInstanceOf(EcmError);
          const ecmError = error as EcmError;
          expect(ecmError.code).toBe(ErrorCode.INVALID_MODULUS);
          expect(ecmError.details?.['modulus']).toBe(n.toString());
        }
      }
    });
  });
});
