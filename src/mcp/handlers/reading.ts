/**
 * MCP tool handlers for the two reading operations.
 */
import { interpretReading, toJsonReading } from '../../core/interpretation/interpret.js';
import { cast, readingFromNotation } from '../../core/reading/operations.js';
import type { Reading } from '../../core/reading/types.js';
import type { ReadingSession } from '../../core/session/loader.js';
import { ErrorCodes, MalformedLineSequenceError } from '../../utils/errors.js';
import { jsonResponse, type ToolResponse } from '../utils.js';

export interface CastToolOptions {
  /** Array of line values, a comma-separated string, or absent for coins */
  lines?: unknown;
  question?: string;
}

export interface InterpretToolOptions {
  input: string;
  question?: string;
}

function respond(session: ReadingSession, reading: Reading): ToolResponse {
  return jsonResponse(toJsonReading(interpretReading(reading, session.lookup)));
}

export function handleCast(session: ReadingSession, options: CastToolOptions): ToolResponse {
  const { lines, question } = options;

  if (lines === undefined || lines === null) {
    return respond(session, cast({ caster: session.caster, question }));
  }

  if (typeof lines !== 'string' && !Array.isArray(lines)) {
    throw new MalformedLineSequenceError(
      ErrorCodes.INVALID_LINE_VALUE,
      'lines must be an array of six line values or a comma-separated string',
      { input: lines }
    );
  }

  return respond(session, cast({ lines, question }));
}

export function handleInterpret(session: ReadingSession, options: InterpretToolOptions): ToolResponse {
  return respond(session, readingFromNotation(options.input, options.question));
}
