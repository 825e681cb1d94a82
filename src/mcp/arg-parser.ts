/**
 * Type-safe argument parser for MCP tool calls.
 *
 * Each getter checks the runtime type of a value from the
 * `Record<string, unknown>` provided by the MCP protocol before returning it.
 */

/** The shape of arguments received from MCP tool calls. */
export type McpArgs = Record<string, unknown> | undefined;

/**
 * Extract an optional string argument.
 * Returns `undefined` if the key is missing, null, or not a string.
 */
export function getString(args: McpArgs, key: string): string | undefined {
  const value = args?.[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  return undefined;
}

/**
 * Extract a required string argument.
 * Throws if the key is missing or not a string.
 */
export function getStringRequired(args: McpArgs, key: string): string {
  const value = getString(args, key);
  if (value === undefined) {
    throw new Error(`Required string argument "${key}" is missing or not a string`);
  }
  return value;
}

/**
 * Extract a raw value from args without type narrowing, for handlers that
 * accept several shapes.
 */
export function getRaw(args: McpArgs, key: string): unknown {
  return args?.[key];
}
