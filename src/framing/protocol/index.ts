/**
 * Protocol Layer
 *
 * Exports wire tags, status codes, header types, and tag guards.
 */

export * from './algorithms.js';
export * from './operations.js';
export * from './status.js';
export * from './guards.js';
export type * from './headers.js';
