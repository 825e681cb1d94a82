/**
 * Shared utilities for the MCP server: project root detection and tool
 * responses.
 */
import { resolve } from 'node:path';
import { IChingError } from '../utils/errors.js';

/**
 * Parse --project argument or fall back to cwd.
 */
export function getDefaultProjectRoot(argv: readonly string[] = process.argv.slice(2)): string {
  // 1. Explicit --project argument
  const projectIdx = argv.indexOf('--project');
  if (projectIdx !== -1 && argv[projectIdx + 1]) {
    return resolve(argv[projectIdx + 1]);
  }

  // 2. ICHING_PROJECT_ROOT environment variable
  if (process.env.ICHING_PROJECT_ROOT) {
    return resolve(process.env.ICHING_PROJECT_ROOT);
  }

  return process.cwd();
}

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function jsonResponse(value: unknown): ToolResponse {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

/**
 * Error response. Oracle errors carry their code and details; anything else
 * is reported by name and message.
 */
export function errorResponse(error: unknown): ToolResponse {
  const body =
    error instanceof IChingError
      ? error.toJSON()
      : { name: error instanceof Error ? error.name : 'Error', message: error instanceof Error ? error.message : String(error) };

  return {
    content: [{ type: 'text', text: JSON.stringify(body, null, 2) }],
    isError: true,
  };
}
