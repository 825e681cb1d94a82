/**
 * Session barrel file.
 */
export * from './loader.js';
