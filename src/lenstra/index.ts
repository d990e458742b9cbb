/**
 * Lenstra Search Module
 *
 * Single-attempt factor search and the randomness it draws curves from.
 */

export * from './random.js';
export * from './search.js';
