/**
 * Reading barrel file.
 */
export * from './types.js';
export * from './builder.js';
export * from './operations.js';
