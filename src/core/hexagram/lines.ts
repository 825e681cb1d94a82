/**
 * Line value helpers: polarity, stability and six-tuple plumbing.
 */
import { MalformedLineSequenceError, ErrorCodes } from '../../utils/errors.js';
import {
  HEXAGRAM_COUNT,
  LINE_POSITIONS,
  type HexagramId,
  type LinePosition,
  type LineSequence,
  type LineValue,
  type Polarity,
  type Six,
  type Stability,
} from './types.js';

export function isLineValue(value: unknown): value is LineValue {
  return value === 6 || value === 7 || value === 8 || value === 9;
}

export function isPolarity(value: unknown): value is Polarity {
  return value === 'yin' || value === 'yang';
}

export function isHexagramId(value: unknown): value is HexagramId {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= HEXAGRAM_COUNT;
}

export function isLinePosition(value: unknown): value is LinePosition {
  return typeof value === 'number' && LINE_POSITIONS.some((position) => position === value);
}

export function polarityOf(value: LineValue): Polarity {
  return value === 7 || value === 9 ? 'yang' : 'yin';
}

export function stabilityOf(value: LineValue): Stability {
  return value === 6 || value === 9 ? 'changing' : 'stable';
}

export function isChanging(value: LineValue): boolean {
  return stabilityOf(value) === 'changing';
}

export function oppositePolarity(polarity: Polarity): Polarity {
  return polarity === 'yang' ? 'yin' : 'yang';
}

/** Young line of the given polarity: 7 for yang, 8 for yin. */
export function stableLineFor(polarity: Polarity): LineValue {
  return polarity === 'yang' ? 7 : 8;
}

/** Old line of the given polarity: 9 for yang, 6 for yin. */
export function changingLineFor(polarity: Polarity): LineValue {
  return polarity === 'yang' ? 9 : 6;
}

/**
 * Map a six-tuple position by position, keeping the tuple shape.
 */
export function mapSix<T, U>(six: Six<T>, fn: (value: T, position: LinePosition) => U): Six<U> {
  return [
    fn(six[0], 1),
    fn(six[1], 2),
    fn(six[2], 3),
    fn(six[3], 4),
    fn(six[4], 5),
    fn(six[5], 6),
  ];
}

/**
 * Narrow an array to a six-tuple. Returns undefined for any other length.
 */
export function toSix<T>(values: readonly T[]): Six<T> | undefined {
  if (values.length !== 6) return undefined;
  const [first, second, third, fourth, fifth, sixth] = values;
  return [first, second, third, fourth, fifth, sixth];
}

/**
 * Validate externally supplied line values.
 * The count is checked before the values, so `7,8,5` reports the count.
 */
export function toLineSequence(values: readonly unknown[], input: string = values.join(',')): LineSequence {
  const six = toSix(values);
  if (!six) {
    throw new MalformedLineSequenceError(
      ErrorCodes.WRONG_LINE_COUNT,
      `Expected exactly 6 line values, got ${values.length}: '${input}'`,
      { input, count: values.length }
    );
  }

  return mapSix(six, (value, position) => {
    if (!isLineValue(value)) {
      throw new MalformedLineSequenceError(
        ErrorCodes.INVALID_LINE_VALUE,
        `Invalid line value ${JSON.stringify(value)} at line ${position}. Must be 6, 7, 8, or 9`,
        { input, position, value }
      );
    }
    return value;
  });
}
