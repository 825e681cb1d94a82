/**
 * Notation parsing barrel file.
 */
export * from './normalizer.js';
