/**
 * Error types and codes for the oracle.
 * This is the error contract - all errors should extend IChingError.
 */

/**
 * Base error class for all oracle errors.
 * `details.input` carries the raw input that was rejected, when there is one.
 */
export class IChingError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'IChingError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A hexagram number outside [1,64], or a value that is not a hexagram vector.
 */
export class OutOfRangeReferenceError extends IChingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'OutOfRangeReferenceError';
  }
}

/**
 * A character outside the Yijing hexagram block, or input matching no notation.
 */
export class UnrecognizedGlyphError extends IChingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'UnrecognizedGlyphError';
  }
}

/**
 * Explicit line sequences with the wrong count or a value outside {6,7,8,9}.
 */
export class MalformedLineSequenceError extends IChingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'MalformedLineSequenceError';
  }
}

/**
 * Changing-hexagram notation (`32→34`) that cannot be resolved.
 */
export class MalformedTransitionError extends IChingError {
  constructor(code: string, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(code, message, details, cause);
    this.name = 'MalformedTransitionError';
  }
}

/**
 * The entropy source behind the coin toss failed.
 * The only error kind a caller may reasonably retry.
 */
export class RandomnessFailureError extends IChingError {
  constructor(code: string, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(code, message, details, cause);
    this.name = 'RandomnessFailureError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends IChingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable data files, parse errors, etc.).
 */
export class SystemError extends IChingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Hexagram references
  OUT_OF_RANGE_REFERENCE: 'OUT_OF_RANGE_REFERENCE',
  INVALID_HEXAGRAM_REFERENCE: 'INVALID_HEXAGRAM_REFERENCE',
  UNRECOGNIZED_GLYPH: 'UNRECOGNIZED_GLYPH',
  UNRECOGNIZED_INPUT: 'UNRECOGNIZED_INPUT',

  // Line sequences
  WRONG_LINE_COUNT: 'WRONG_LINE_COUNT',
  INVALID_LINE_VALUE: 'INVALID_LINE_VALUE',

  // Transitions
  MALFORMED_TRANSITION: 'MALFORMED_TRANSITION',
  IDENTICAL_HEXAGRAMS: 'IDENTICAL_HEXAGRAMS',

  // Casting
  RANDOMNESS_FAILURE: 'RANDOMNESS_FAILURE',

  // Config and data files
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_CORPUS: 'INVALID_CORPUS',
  INVALID_SEQUENCE_TABLE: 'INVALID_SEQUENCE_TABLE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
