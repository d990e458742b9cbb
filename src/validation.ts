/**
 * Input Validation Module
 *
 * Centralized checks for the public entry points. Validation can be
 * switched off for hot loops that already know their inputs are sound.
 */

import type { Point } from './types.js';
import type { CurveGroup } from './curve/curve-group.js';
import {
  invalidCurvePointError,
  invalidModulusError,
  invalidScalarError,
} from './errors.js';
import { isInfinity } from './curve/point.js';

/**
 * Global validation configuration
 */
export interface ValidationConfig {
  /** Enable/disable all validation (default: true) */
  enabled: boolean;
  /** Enable/disable scalar validation (default: true) */
  validateScalars: boolean;
  /** Enable/disable curve point validation (default: true) */
  validateCurvePoints: boolean;
}

const defaultValidationConfig: ValidationConfig = {
  enabled: true,
  validateScalars: true,
  validateCurvePoints: true,
};

let currentValidationConfig: ValidationConfig = { ...defaultValidationConfig };

/**
 * Get the current validation configuration
 */
export function getValidationConfig(): Readonly<ValidationConfig> {
  return { ...currentValidationConfig };
}

/**
 * Set the validation configuration
 *
 * @param config - Partial configuration to merge with current config
 */
export function setValidationConfig(config: Partial<ValidationConfig>): void {
  currentValidationConfig = { ...currentValidationConfig, ...config };
}

/**
 * Reset validation configuration to defaults
 */
export function resetValidationConfig(): void {
  currentValidationConfig = { ...defaultValidationConfig };
}

/**
 * Run a function with validation temporarily disabled
 */
export function withoutValidation<T>(fn: () => T): T {
  const previousConfig = { ...currentValidationConfig };
  currentValidationConfig.enabled = false;
  try {
    return fn();
  } finally {
    currentValidationConfig = previousConfig;
  }
}

/**
 * Validate that N can be handed to the search
 *
 * N must be at least 2. Primality is not checked.
 *
 * @throws EcmError (INVALID_MODULUS)
 */
export function validateModulus(modulus: bigint): void {
  if (!currentValidationConfig.enabled) {
    return;
  }
  if (modulus < 2n) {
    throw invalidModulusError(modulus.toString());
  }
}

/**
 * Validate that a scalar is a positive integer
 *
 * @throws EcmError (INVALID_SCALAR)
 */
export function validateScalar(scalar: bigint): void {
  if (!currentValidationConfig.enabled || !currentValidationConfig.validateScalars) {
    return;
  }
  if (scalar < 1n) {
    throw invalidScalarError(scalar.toString());
  }
}

/**
 * Validate that a point lies on the given curve
 *
 * @throws EcmError (INVALID_CURVE_POINT)
 */
export function validateCurvePoint(group: CurveGroup, point: Point): void {
  if (!currentValidationConfig.enabled || !currentValidationConfig.validateCurvePoints) {
    return;
  }
  if (isInfinity(point) || group.contains(point)) {
    return;
  }
  throw invalidCurvePointError(
    point.x.toString(),
    point.y.toString(),
    group.parameters.modulus.toString()
  );
}
