/**
 * Interpretation barrel file.
 */
export * from './types.js';
export * from './interpret.js';
