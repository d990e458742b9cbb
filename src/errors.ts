/**
 * Error handling for lenstra-ecm
 *
 * Input and configuration problems surface as EcmError instances carrying a
 * code and an optional details record. A failed modular inversion inside the
 * curve group is not one of them: it is the productive outcome of the search
 * and travels as the `factor` variant of a CurveOperationResult.
 */

/**
 * Error codes for factorization operations
 *
 * These codes allow programmatic handling of specific error conditions.
 */
export enum ErrorCode {
  // Input validation errors
  /** Modulus is below 2 */
  INVALID_MODULUS = 'INVALID_MODULUS',
  /** Scalar is not a positive integer */
  INVALID_SCALAR = 'INVALID_SCALAR',
  /** Point does not satisfy the curve equation modulo N */
  INVALID_CURVE_POINT = 'INVALID_CURVE_POINT',

  // Arithmetic errors
  /** No modular inverse exists for the given value */
  NO_INVERSE = 'NO_INVERSE',

  // Configuration errors
  /** Invalid configuration option provided */
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Base error class for factorization errors
 *
 * @example
 * ```typescript
 * try {
 *   lenstraAttempt(1n);
 * } catch (error) {
 *   if (error instanceof EcmError && error.code === ErrorCode.INVALID_MODULUS) {
 *     console.error('Bad modulus:', error.details);
 *   }
 * }
 * ```
 */
export class EcmError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param details - Optional details object with relevant context
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EcmError';
    Object.setPrototypeOf(this, EcmError.prototype);
  }

  /**
   * Create a string representation of the error including details
   */
  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.details) {
      str += ` (${JSON.stringify(this.details)})`;
    }
    return str;
  }

  /**
   * Convert error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is an EcmError
 */
export function isEcmError(error: unknown): error is EcmError {
  return error instanceof EcmError;
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an error for a modulus that cannot be factored
 *
 * @param modulus - The rejected modulus as string
 */
export function invalidModulusError(modulus: string): EcmError {
  return new EcmError('Modulus must be an integer >= 2', ErrorCode.INVALID_MODULUS, {
    modulus,
  });
}

/**
 * Create an error for a scalar that is not a positive integer
 *
 * @param value - The rejected scalar as string
 */
export function invalidScalarError(value: string): EcmError {
  return new EcmError('Scalar must be a positive integer', ErrorCode.INVALID_SCALAR, { value });
}

/**
 * Create an error for a point that is not on the curve
 *
 * @param x - X coordinate as string
 * @param y - Y coordinate as string
 * @param modulus - Curve modulus as string
 */
export function invalidCurvePointError(x: string, y: string, modulus: string): EcmError {
  return new EcmError('Point is not on the curve', ErrorCode.INVALID_CURVE_POINT, {
    x,
    y,
    modulus,
  });
}

/**
 * Create an error for a value with no inverse modulo N
 *
 * @param value - The value as string
 * @param modulus - The modulus as string
 * @param divisor - gcd(value, modulus) as string
 */
export function noInverseError(value: string, modulus: string, divisor: string): EcmError {
  return new EcmError('No modular inverse exists', ErrorCode.NO_INVERSE, {
    value,
    modulus,
    divisor,
  });
}

/**
 * Create an error for invalid configuration
 *
 * @param option - Name of the invalid option
 * @param value - The invalid value
 * @param reason - Optional explanation
 */
export function invalidConfigError(option: string, value: unknown, reason?: string): EcmError {
  const details: Record<string, unknown> = { option, value: String(value) };
  if (reason !== undefined) {
    details['reason'] = reason;
  }
  return new EcmError(
    `Invalid configuration option '${option}': ${String(value)}`,
    ErrorCode.INVALID_CONFIG,
    details
  );
}
