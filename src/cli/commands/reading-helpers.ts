/**
 * Shared pieces of the reading commands: format choices, session setup and
 * rendering in the requested format.
 */
import { OutputFormatSchema } from '../../core/config/schema.js';
import { interpretReading } from '../../core/interpretation/interpret.js';
import type { Reading } from '../../core/reading/types.js';
import { openSession, type ReadingSession } from '../../core/session/loader.js';
import { createFormatter } from '../formatters/index.js';

/** Format choices offered by `--format`. */
export const OUTPUT_FORMATS = OutputFormatSchema.options;

/** Options shared by `cast` and `interpret`. */
export interface ReadingCommandOptions {
  question?: string;
  format?: string;
  config: string;
}

export function openCommandSession(options: ReadingCommandOptions): Promise<ReadingSession> {
  return openSession(process.cwd(), options.config);
}

/**
 * Render a reading; `format` falls back to the configured output format.
 */
export function renderReading(reading: Reading, session: ReadingSession, format?: string): string {
  const outputFormat = OutputFormatSchema.parse(format ?? session.config.output.format);
  const formatter = createFormatter(outputFormat, { colors: session.config.output.colors });
  return formatter.format(interpretReading(reading, session.lookup));
}
