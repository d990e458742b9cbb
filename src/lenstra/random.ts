/**
 * Randomness for curve selection
 *
 * The search never touches process-wide random state: it draws through a
 * RandomSource, so tests can replay an attempt with a seeded or fixed
 * sequence.
 */

import { getRandomValues } from 'node:crypto';
import type { RandomSource } from '../types.js';
import { invalidConfigError } from '../errors.js';
import { bitLength } from '../ring/operations.js';

/**
 * Draw uniformly from [min, max] by rejection sampling
 *
 * @param randomBits - Returns a uniformly random non-negative bigint of `bits` bits
 */
function sampleInRange(
  min: bigint,
  max: bigint,
  randomBits: (bits: number) => bigint
): bigint {
  if (max < min) {
    throw invalidConfigError('range', `[${min}, ${max}]`, 'max must not be below min');
  }
  const span = max - min + 1n;
  const bits = bitLength(span - 1n);
  if (bits === 0) {
    return min;
  }
  for (;;) {
    const candidate = randomBits(bits);
    if (candidate < span) {
      return min + candidate;
    }
  }
}

/**
 * Cryptographically strong source backed by crypto.getRandomValues
 */
export const cryptoRandomSource: RandomSource = {
  nextBigInt(min: bigint, max: bigint): bigint {
    return sampleInRange(min, max, (bits) => {
      const bytes = new Uint8Array(Math.ceil(bits / 8));
      getRandomValues(bytes);
      let value = 0n;
      for (const byte of bytes) {
        value = (value << 8n) | BigInt(byte);
      }
      return value & ((1n << BigInt(bits)) - 1n);
    });
  },
};

const LCG_MULTIPLIER = 6364136223846793005n;
const LCG_INCREMENT = 1442695040888963407n;
const MASK_64 = (1n << 64n) - 1n;

/**
 * Deterministic source for reproducible attempts
 *
 * A 64-bit linear congruential generator; the upper 32 bits of each state
 * are used. Not suitable for anything security related.
 */
export function createSeededRandomSource(seed: number | bigint): RandomSource {
  let state = BigInt(seed) & MASK_64;

  const next32 = (): bigint => {
    state = (state * LCG_MULTIPLIER + LCG_INCREMENT) & MASK_64;
    return state >> 32n;
  };

  return {
    nextBigInt(min: bigint, max: bigint): bigint {
      return sampleInRange(min, max, (bits) => {
        let value = 0n;
        for (let produced = 0; produced < bits; produced += 32) {
          value = (value << 32n) | next32();
        }
        return value & ((1n << BigInt(bits)) - 1n);
      });
    },
  };
}

/**
 * Source that replays a fixed list of values, cycling when it runs out
 *
 * Each value must lie in the range it is requested for.
 */
export function createSequenceRandomSource(values: readonly bigint[]): RandomSource {
  if (values.length === 0) {
    throw invalidConfigError('values', '[]', 'sequence must not be empty');
  }
  let index = 0;

  return {
    nextBigInt(min: bigint, max: bigint): bigint {
      const value = values[index % values.length];
      index++;
      if (value === undefined || value < min || value > max) {
        throw invalidConfigError('values', String(value), `outside [${min}, ${max}]`);
      }
      return value;
    },
  };
}
