/**
 * Re-exports all MCP tool handlers.
 */
export { handleHelp } from './meta.js';
export { handleCast, handleInterpret } from './reading.js';
export type { CastToolOptions, InterpretToolOptions } from './reading.js';
