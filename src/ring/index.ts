/**
 * Ring Arithmetic Module
 *
 * Modular arithmetic over Z/NZ, including gcd and the modular inverse the
 * curve group relies on.
 */

export * from './operations.js';
