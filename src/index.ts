/**
 * lenstra-ecm
 *
 * Integer factorization with Lenstra's Elliptic Curve Method. The library
 * provides:
 * - Arithmetic in Z/NZ (gcd, modular inverse)
 * - Weierstrass curve group law over Z/NZ that reports non-invertible
 *   denominators as divisors of N
 * - Double-and-add scalar multiplication
 * - A single randomized factor search attempt
 *
 * @example
 * ```typescript
 * import { lenstraAttempt } from 'lenstra-ecm';
 *
 * const n = 455839n;
 * let d = 1n;
 * while (d === 1n || d === n) {
 *   d = lenstraAttempt(n);
 * }
 * console.log(`${n} = ${d} * ${n / d}`);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Types
// ============================================================================
export type {
  FinitePoint,
  InfinityPoint,
  Point,
  CurveParameters,
  CurveOperationResult,
  RandomSource,
  LenstraStatus,
  LenstraOptions,
  LenstraResult,
} from './types.js';

// ============================================================================
// Configuration
// ============================================================================
export { configure, getConfig, resetConfig, type LenstraConfig } from './config.js';

// ============================================================================
// Ring arithmetic
// ============================================================================
export {
  mod,
  gcd,
  extendedGcd,
  modInverse,
  ringAdd,
  ringSub,
  ringMul,
  ringSquare,
  bitLength,
} from './ring/index.js';

// ============================================================================
// Curve points, group law and scalar multiplication
// ============================================================================
export {
  INFINITY,
  createPoint,
  isInfinity,
  isFinitePoint,
  pointsEqual,
  pointToString,
  CurveGroup,
  pointResult,
  factorResult,
  tryScalarMultiply,
  scalarMultiply,
} from './curve/index.js';

// ============================================================================
// Factor search
// ============================================================================
export {
  lenstraAttempt,
  lenstraAttemptWithMetadata,
  cryptoRandomSource,
  createSeededRandomSource,
  createSequenceRandomSource,
} from './lenstra/index.js';

// ============================================================================
// Validation
// ============================================================================
export {
  getValidationConfig,
  setValidationConfig,
  resetValidationConfig,
  withoutValidation,
  validateModulus,
  validateScalar,
  validateCurvePoint,
  type ValidationConfig,
} from './validation.js';

// ============================================================================
// Errors
// ============================================================================
export {
  EcmError,
  ErrorCode,
  isEcmError,
  invalidModulusError,
  invalidScalarError,
  invalidCurvePointError,
  noInverseError,
  invalidConfigError,
} from './errors.js';
