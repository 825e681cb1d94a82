/**
 * One-line formatters: brief, motd (message-of-the-day) and numbers.
 */
import type { Interpretation } from '../../core/interpretation/types.js';
import type { IFormatter } from './types.js';
import { hexagramLabel, hexagramName } from './shared.js';

/**
 * Format: `䷾ 63 After Completion → ䷐ 17 Following (lines: 3, 4)`,
 * preceded by `Q: <question>` when one was asked.
 */
export class BriefFormatter implements IFormatter {
  format(interpretation: Interpretation): string {
    const { reading, primary, transformed } = interpretation;
    const lines: string[] = [];

    if (reading.question) {
      lines.push(`Q: ${reading.question}`);
    }

    let summary = hexagramLabel(primary);
    if (transformed) {
      summary += ` → ${hexagramLabel(transformed)} (lines: ${reading.changingLines.join(', ')})`;
    }
    lines.push(summary);

    return lines.join('\n');
  }
}

/**
 * Format: `䷾→䷐ 63 AFTER COMPLETION CHANGING INTO 17 FOLLOWING`.
 */
export class MotdFormatter implements IFormatter {
  format(interpretation: Interpretation): string {
    const { primary, transformed } = interpretation;
    const primaryName = hexagramName(primary).toUpperCase();

    if (!transformed) {
      return `${primary.glyph} ${primary.number} ${primaryName}`;
    }

    return (
      `${primary.glyph}→${transformed.glyph} ${primary.number} ${primaryName}` +
      ` CHANGING INTO ${transformed.number} ${hexagramName(transformed).toUpperCase()}`
    );
  }
}

/**
 * Format: `[7, 8, 9, 6, 7, 8]`.
 */
export class NumbersFormatter implements IFormatter {
  format(interpretation: Interpretation): string {
    return `[${interpretation.reading.lines.join(', ')}]`;
  }
}
