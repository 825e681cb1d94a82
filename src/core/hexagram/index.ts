/**
 * Hexagram algebra barrel file.
 */
export * from './types.js';
export * from './lines.js';
export * from './king-wen.js';
export * from './sequence.js';
export * from './codec.js';
export * from './trigrams.js';
