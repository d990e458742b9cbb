/**
 * Lenstra's Elliptic Curve Method: one attempt
 *
 * Picks a random curve through a random point, then replaces the point with
 * i·P for i = 1, 2, 3, ... until the curve arithmetic breaks on a divisor
 * of N. The multiplier grows linearly, so after step i the point is i!·P0.
 *
 * A single attempt is probabilistic and may come back with 1. Retrying with
 * fresh randomness is left to the caller.
 */

import type { LenstraOptions, LenstraResult, Point } from '../types.js';
import { getConfig, validateMaxMultiplier } from '../config.js';
import { createDebugLogger } from '../debug.js';
import { CurveGroup } from '../curve/curve-group.js';
import { createPoint, isInfinity, pointToString } from '../curve/point.js';
import { scalarMultiply } from '../curve/scalar-multiplication.js';
import { validateCurvePoint, validateModulus } from '../validation.js';

const debugLog = createDebugLogger('search');

/**
 * Run one attempt and report how it ended
 *
 * @param n - The number to factor (composite, >= 2)
 * @param options - Overrides for the global configuration
 * @returns The factor together with the curve, start point and step count
 * @throws EcmError (INVALID_MODULUS) if n < 2 and validation is enabled
 *
 * @example
 * ```typescript
 * const result = lenstraAttemptWithMetadata(455839n);
 * if (result.status === 'found' && result.factor !== 455839n) {
 *   console.log(`${result.factor} after ${result.multipliers} steps`);
 * }
 * ```
 */
export function lenstraAttemptWithMetadata(n: bigint, options?: LenstraOptions): LenstraResult {
  const config = getConfig();
  const random = options?.random ?? config.random;
  const maxMultiplier = options?.maxMultiplier ?? config.maxMultiplier;
  const validateInputs = options?.validateInputs ?? config.validateInputs;

  validateMaxMultiplier(maxMultiplier);
  if (validateInputs) {
    validateModulus(n);
  }

  const startTime = performance.now();

  const x0 = random.nextBigInt(1n, n);
  const y0 = random.nextBigInt(1n, n);
  const a = random.nextBigInt(1n, n);
  const group = CurveGroup.throughPoint(x0, y0, a, n);
  const startPoint = createPoint(x0, y0);

  if (validateInputs) {
    validateCurvePoint(group, startPoint);
  }

  debugLog('Selected curve', {
    curve: group.toString(),
    startPoint: pointToString(startPoint),
  });

  let point: Point = startPoint;
  let i = 1;
  while (!group.isBroken() && !isInfinity(point)) {
    if (maxMultiplier !== undefined && i > maxMultiplier) {
      break;
    }
    point = scalarMultiply(group, point, BigInt(i));
    i++;
  }

  const factor = group.factorHint();
  const multipliers = i - 1;
  const timeMs = performance.now() - startTime;

  if (factor !== 1n) {
    debugLog('Curve broke on a divisor of N', {
      factor: factor.toString(),
      multipliers,
      timeMs,
    });
    return {
      factor,
      status: 'found',
      multipliers,
      curve: group.parameters,
      startPoint,
      timeMs,
    };
  }

  debugLog('No divisor exposed on this curve', { multipliers, maxMultiplier, timeMs });
  return {
    factor: 1n,
    status: 'exhausted',
    multipliers,
    curve: group.parameters,
    startPoint,
    timeMs,
  };
}

/**
 * Run one attempt of Lenstra's method
 *
 * @param n - The number to factor (composite, >= 2)
 * @param options - Overrides for the global configuration
 * @returns A divisor of n in (1, n], or 1 if this curve exposed none
 */
export function lenstraAttempt(n: bigint, options?: LenstraOptions): bigint {
  return lenstraAttemptWithMetadata(n, options).factor;
}
