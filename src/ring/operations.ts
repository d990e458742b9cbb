/**
 * Arithmetic in Z/NZ
 *
 * Plain bigint helpers for the ring of integers modulo N. N is generally
 * composite, so Z/NZ has zero-divisors and inversion can fail; callers check
 * `gcd(value, N)` before asking for an inverse.
 */

import { noInverseError } from '../errors.js';

/**
 * Reduce a value into [0, n)
 */
export function mod(a: bigint, n: bigint): bigint {
  const r = a % n;
  return r < 0n ? r + n : r;
}

/**
 * Greatest common divisor, always non-negative
 *
 * gcd(0, n) = |n|.
 */
export function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Extended Euclidean algorithm
 *
 * Returns (gcd, x, y) such that a*x + b*y = gcd
 */
export function extendedGcd(a: bigint, b: bigint): { gcd: bigint; x: bigint; y: bigint } {
  let [oldR, r] = [a, b];
  let [oldS, s] = [1n, 0n];
  let [oldT, t] = [0n, 1n];

  while (r !== 0n) {
    const quotient = oldR / r;
    [oldR, r] = [r, oldR - quotient * r];
    [oldS, s] = [s, oldS - quotient * s];
    [oldT, t] = [t, oldT - quotient * t];
  }

  if (oldR < 0n) {
    return { gcd: -oldR, x: -oldS, y: -oldT };
  }
  return { gcd: oldR, x: oldS, y: oldT };
}

/**
 * Modular inverse: a^(-1) mod n
 *
 * Requires gcd(a, n) = 1. The curve group checks this before calling, so the
 * throw below only fires on misuse.
 *
 * @returns b in [0, n) with a*b ≡ 1 (mod n)
 * @throws EcmError (NO_INVERSE) if gcd(a, n) != 1
 */
export function modInverse(a: bigint, n: bigint): bigint {
  const reduced = mod(a, n);
  const { gcd: g, x } = extendedGcd(reduced, n);

  if (g !== 1n) {
    throw noInverseError(a.toString(), n.toString(), g.toString());
  }

  return mod(x, n);
}

/**
 * Ring addition: (a + b) mod n
 */
export function ringAdd(a: bigint, b: bigint, n: bigint): bigint {
  return mod(a + b, n);
}

/**
 * Ring subtraction: (a - b) mod n
 */
export function ringSub(a: bigint, b: bigint, n: bigint): bigint {
  return mod(a - b, n);
}

/**
 * Ring multiplication: (a * b) mod n
 */
export function ringMul(a: bigint, b: bigint, n: bigint): bigint {
  return mod(a * b, n);
}

/**
 * Ring squaring: a² mod n
 */
export function ringSquare(a: bigint, n: bigint): bigint {
  return mod(a * a, n);
}

/**
 * Number of bits in the binary expansion of a positive integer
 */
export function bitLength(k: bigint): number {
  let bits = 0;
  let temp = k;
  while (temp > 0n) {
    bits++;
    temp >>= 1n;
  }
  return bits;
}
