/**
 * Divination barrel file.
 */
export * from './random-source.js';
export * from './coin-caster.js';
