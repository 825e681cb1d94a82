/**
 * Full human-readable reading: line drawing, trigrams and every corpus text
 * available for the primary hexagram, its changing lines and the
 * transformed hexagram.
 */
import chalk from 'chalk';
import { LINE_POSITIONS } from '../../core/hexagram/types.js';
import type { Trigram } from '../../core/hexagram/trigrams.js';
import type { Interpretation } from '../../core/interpretation/types.js';
import type { IFormatter, FormatOptions } from './types.js';
import { chineseLine, hexagramName, lineSymbol } from './shared.js';

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
    };
  }

  format(interpretation: Interpretation): string {
    const { reading, primary, transformed } = interpretation;
    const lines: string[] = [];

    if (reading.question) {
      lines.push(`Question: ${reading.question}`);
      lines.push('');
    }

    lines.push(this.colorize(`Hexagram ${primary.number} ${primary.glyph} ${hexagramName(primary)}`, 'bold'));

    // Top line first, as the figure is drawn
    for (const position of [...LINE_POSITIONS].reverse()) {
      const value = reading.lines[position - 1];
      const symbol = lineSymbol(value);
      lines.push(`${position}: ${value === 6 || value === 9 ? this.colorize(symbol, 'yellow') : symbol}`);
    }

    if (reading.changingLines.length > 0) {
      lines.push('');
      lines.push(`Changing lines: ${reading.changingLines.join(', ')}`);
      if (transformed) {
        lines.push(`Transforms to hexagram ${transformed.number} ${transformed.glyph} ${hexagramName(transformed)}`);
      }
    }

    lines.push('');
    lines.push(`Traditional numbers: ${reading.lines.join(', ')}`);
    lines.push(`Upper trigram: ${this.formatTrigram(primary.upperTrigram)}`);
    lines.push(`Lower trigram: ${this.formatTrigram(primary.lowerTrigram)}`);

    if (primary.text) {
      lines.push('');
      lines.push(this.colorize(`=== ${primary.glyph} ${primary.text.name} ===`, 'cyan'));
      const chinese = chineseLine(primary);
      if (chinese) lines.push(chinese);
      if (primary.text.description) lines.push(`Description: ${primary.text.description}`);

      if (primary.text.judgment) {
        lines.push('');
        lines.push(`Judgment: ${primary.text.judgment.text}`);
        if (primary.text.judgment.commentary) lines.push(`Commentary: ${primary.text.judgment.commentary}`);
      }

      if (primary.text.image) {
        lines.push('');
        lines.push(`Image: ${primary.text.image.text}`);
        if (primary.text.image.commentary) lines.push(`Image Commentary: ${primary.text.image.commentary}`);
      }
    }

    const textedLines = interpretation.changingLines.filter((line) => line.text);
    if (textedLines.length > 0) {
      lines.push('');
      lines.push(this.colorize('=== Changing Lines ===', 'cyan'));
      for (const line of textedLines) {
        lines.push(`Line ${line.position} (${line.value}): ${line.text?.text ?? ''}`);
        if (line.text?.comments) lines.push(`Comments: ${line.text.comments}`);
      }
    }

    if (transformed?.text) {
      lines.push('');
      lines.push(this.colorize(`=== Transforms to ${transformed.glyph} ${transformed.text.name} ===`, 'cyan'));
      const chinese = chineseLine(transformed);
      if (chinese) lines.push(chinese);
      if (transformed.text.description) lines.push(`Description: ${transformed.text.description}`);
      if (transformed.text.judgment) lines.push(`Judgment: ${transformed.text.judgment.text}`);
    }

    return lines.join('\n');
  }

  private formatTrigram(trigram: Trigram): string {
    return `${trigram.glyph} ${trigram.name} (${trigram.chinese})`;
  }

  private colorize(text: string, color: 'bold' | 'cyan' | 'yellow'): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'bold':
        return chalk.bold(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'yellow':
        return chalk.yellow(text);
    }
  }
}
