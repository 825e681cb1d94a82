/**
 * Corpus barrel file.
 */
export * from './schema.js';
export * from './lookup.js';
export * from './loader.js';
