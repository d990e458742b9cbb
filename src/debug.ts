/**
 * Debug logging
 *
 * Output goes through console.debug and is off unless one of these is set:
 * - DEBUG containing "lenstra-ecm"
 * - LENSTRA_ECM_DEBUG=1 or LENSTRA_ECM_DEBUG=true
 * - configure({ debug: true })
 */

import { getConfig } from './config.js';

export type DebugLogger = (message: string, data?: Record<string, unknown>) => void;

/**
 * Check whether debug output is currently enabled
 */
export function isDebugEnabled(): boolean {
  const debugEnv = process.env['DEBUG'] ?? '';
  const ecmDebugEnv = process.env['LENSTRA_ECM_DEBUG'] ?? '';
  return (
    getConfig().debug ||
    debugEnv.includes('lenstra-ecm') ||
    ecmDebugEnv === '1' ||
    ecmDebugEnv === 'true'
  );
}

/**
 * Create a debug logger for one module
 *
 * @param scope - Suffix of the log prefix, e.g. "search"
 */
export function createDebugLogger(scope: string): DebugLogger {
  return (message, data) => {
    if (!isDebugEnabled()) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [lenstra-ecm:${scope}]`;
    if (data) {
      // eslint-disable-next-line no-console
      console.debug(`${prefix} ${message}`, data);
    } else {
      // eslint-disable-next-line no-console
      console.debug(`${prefix} ${message}`);
    }
  };
}
