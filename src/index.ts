/**
 * I Ching oracle: coin casting, hexagram codec, notation parsing and
 * readings with texts.
 * Main library exports barrel file.
 */

// Hexagram algebra
export * from './core/hexagram/index.js';

// Coin casting
export * from './core/divination/index.js';

// Input notations
export * from './core/notation/index.js';

// Readings
export * from './core/reading/index.js';

// Texts and interpretation
export * from './core/corpus/index.js';
export * from './core/interpretation/index.js';

// Configuration
export * from './core/config/index.js';
export * from './core/session/index.js';

// Utilities
export * from './utils/index.js';

// Formatters
export { createFormatter } from './cli/formatters/index.js';
export type { FormatOptions, IFormatter } from './cli/formatters/index.js';

// CLI
export { createCli } from './cli/index.js';
