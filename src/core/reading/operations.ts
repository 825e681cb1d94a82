/**
 * The two operations front ends call: cast a reading, and build a reading
 * from a written notation.
 */
import { CoinCaster } from '../divination/coin-caster.js';
import { toLineSequence } from '../hexagram/lines.js';
import { parseInput, parseLineSequence } from '../notation/normalizer.js';
import { buildFromInput, buildFromLines, castReading } from './builder.js';
import type { Reading } from './types.js';

export interface CastOptions {
  /** Explicit line values, as an array or as `7,8,9,6,7,8`; coins are cast when absent */
  lines?: readonly unknown[] | string;
  caster?: CoinCaster;
  question?: string;
}

export function cast(options: CastOptions = {}): Reading {
  const { lines, question } = options;
  if (lines === undefined) {
    return castReading(options.caster ?? new CoinCaster(), question);
  }
  const sequence = typeof lines === 'string' ? parseLineSequence(lines) : toLineSequence(lines);
  return buildFromLines(sequence, question);
}

export function readingFromNotation(raw: string, question?: string): Reading {
  return buildFromInput(parseInput(raw), question);
}
