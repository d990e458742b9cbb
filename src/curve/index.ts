/**
 * Elliptic Curve Module
 *
 * Points, the curve group over Z/NZ and scalar multiplication.
 */

// Point representation
export * from './point.js';

// Group law with factor detection
export * from './curve-group.js';

// Double-and-add scalar multiplication
export * from './scalar-multiplication.js';
