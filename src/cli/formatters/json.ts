/**
 * JSON output formatter for machine consumption.
 */
import { toJsonReading } from '../../core/interpretation/interpret.js';
import type { Interpretation } from '../../core/interpretation/types.js';
import type { IFormatter } from './types.js';

export class JsonFormatter implements IFormatter {
  format(interpretation: Interpretation): string {
    return JSON.stringify(toJsonReading(interpretation), null, 2);
  }
}
