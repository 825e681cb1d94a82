/**
 * Formatter type definitions.
 */
import type { Interpretation } from '../../core/interpretation/types.js';

export type { OutputFormat } from '../../core/config/schema.js';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
}

/**
 * Interface for reading formatters.
 */
export interface IFormatter {
  format(interpretation: Interpretation): string;
}
