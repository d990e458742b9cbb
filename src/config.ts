/**
 * Library Configuration
 *
 * Global defaults for Lenstra attempts. Per-call LenstraOptions take
 * precedence over these values.
 *
 * @example
 * ```typescript
 * import { configure, createSeededRandomSource } from 'lenstra-ecm';
 *
 * configure({
 *   random: createSeededRandomSource(42),
 *   maxMultiplier: 10_000,
 * });
 * ```
 */

import type { RandomSource } from './types.js';
import { invalidConfigError } from './errors.js';
import { cryptoRandomSource } from './lenstra/random.js';

/**
 * Global configuration options
 */
export interface LenstraConfig {
  /** Randomness for curve selection (default: crypto.getRandomValues) */
  random: RandomSource;
  /** Largest multiplier to apply per curve (default: unbounded) */
  maxMultiplier: number | undefined;
  /** Whether to validate inputs by default (default: true) */
  validateInputs: boolean;
  /** Enable debug logging (default: false) */
  debug: boolean;
}

function defaultConfig(): LenstraConfig {
  return {
    random: cryptoRandomSource,
    maxMultiplier: undefined,
    validateInputs: true,
    debug: false,
  };
}

let globalConfig: LenstraConfig = defaultConfig();

/**
 * Check a multiplier bound, throwing if it is not a positive integer
 */
export function validateMaxMultiplier(value: number | undefined): void {
  if (value === undefined) {
    return;
  }
  if (!Number.isSafeInteger(value) || value < 1) {
    throw invalidConfigError('maxMultiplier', value, 'must be a positive integer');
  }
}

/**
 * Configure global library settings
 *
 * @param config - Configuration options to set
 */
export function configure(config: Partial<LenstraConfig>): void {
  if ('maxMultiplier' in config) {
    validateMaxMultiplier(config.maxMultiplier);
  }
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Get the current library configuration
 */
export function getConfig(): Readonly<LenstraConfig> {
  return { ...globalConfig };
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = defaultConfig();
}
