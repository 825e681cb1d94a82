/**
 * Formatter exports and factory.
 */
import { HumanFormatter } from './human.js';
import { BriefFormatter, MotdFormatter, NumbersFormatter } from './compact.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export { HumanFormatter, BriefFormatter, MotdFormatter, NumbersFormatter, JsonFormatter };
export type { FormatOptions, IFormatter, OutputFormat };

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  switch (format) {
    case 'full':
      return new HumanFormatter(options);
    case 'brief':
      return new BriefFormatter();
    case 'json':
      return new JsonFormatter();
    case 'numbers':
      return new NumbersFormatter();
    case 'motd':
      return new MotdFormatter();
  }
}
