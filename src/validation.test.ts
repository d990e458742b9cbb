/**
 * Tests for Input Validation
 *
 * - Moduli below 2 are rejected
 * - Scalars below 1 are rejected
 * - Points off the curve are rejected
 * - The global switch turns checks off
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { PROPERTY_TEST_CONFIG, arbitraryCompositeModulus } from './test-utils/property-test-config.js';
import {
  getValidationConfig,
  resetValidationConfig,
  setValidationConfig,
  validateCurvePoint,
  validateModulus,
  validateScalar,
  withoutValidation,
} from './validation.js';
import { CurveGroup } from './curve/curve-group.js';
import { INFINITY, createPoint } from './curve/point.js';
import { EcmError, ErrorCode } from './errors.js';

describe('Input validation', () => {
  afterEach(() => {
    resetValidationConfig();
  });

  describe('validateModulus', () => {
    it('should accept every modulus >= 2', () => {
      fc.assert(
        fc.property(arbitraryCompositeModulus(), (n) => {
          validateModulus(n);
          return true;
        }),
        PROPERTY_TEST_CONFIG
      );
      expect(() => validateModulus(2n)).not.toThrow();
    });

    it('should reject moduli below 2', () => {
      try {
        validateModulus(1n);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(EcmError);
        expect((error as EcmError).code).toBe(ErrorCode.INVALID_MODULUS);
      }
    });
  });

  describe('validateScalar', () => {
    it('accepts positive scalars and rejects the rest', () => {
      expect(() => validateScalar(1n)).not.toThrow();
      expect(() => validateScalar(0n)).toThrow(EcmError);
      expect(() => validateScalar(-1n)).toThrow('Scalar must be a positive integer');
    });

    it('can be switched off on its own', () => {
      setValidationConfig({ validateScalars: false });
      expect(() => validateScalar(0n)).not.toThrow();
      expect(() => validateModulus(0n)).toThrow(EcmError);
    });
  });

  describe('validateCurvePoint', () => {
    const group = CurveGroup.throughPoint(3n, 6n, 2n, 77n);

    it('accepts points on the curve and infinity', () => {
      expect(() => validateCurvePoint(group, createPoint(3n, 6n))).not.toThrow();
      expect(() => validateCurvePoint(group, createPoint(10n, 22n))).not.toThrow();
      expect(() => validateCurvePoint(group, INFINITY)).not.toThrow();
    });

    it('rejects points off the curve with their coordinates', () => {
      try {
        validateCurvePoint(group, createPoint(3n, 7n));
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(EcmError);
        const ecmError = error as EcmError;
        expect(ecmError.code).toBe(ErrorCode.INVALID_CURVE_POINT);
        expect(ecmError.details).toEqual({ x: '3', y: '7', modulus: '77' });
      }
    });

    it('can be switched off on its own', () => {
      setValidationConfig({ validateCurvePoints: false });
      expect(() => validateCurvePoint(group, createPoint(3n, 7n))).not.toThrow();
    });
  });

  describe('configuration', () => {
    it('restores the previous configuration after withoutValidation', () => {
      const result = withoutValidation(() => {
        validateModulus(0n);
        validateScalar(0n);
        return getValidationConfig().enabled;
      });
      expect(result).toBe(false);
      expect(getValidationConfig()).toEqual({
        enabled: true,
        validateScalars: true,
        validateCurvePoints: true,
      });
    });
  });
});
