/**
 * Hexagram and line type definitions.
 */

/**
 * Traditional line value from the three-coin toss:
 * 6 = old yin, 7 = young yang, 8 = young yin, 9 = old yang.
 */
export type LineValue = 6 | 7 | 8 | 9;

export type Polarity = 'yin' | 'yang';

/** Changing lines (6 and 9) flip polarity in the transformed hexagram. */
export type Stability = 'stable' | 'changing';

/** Line position, 1 = bottom, 6 = top. */
export type LinePosition = 1 | 2 | 3 | 4 | 5 | 6;

export const LINE_POSITIONS: readonly LinePosition[] = [1, 2, 3, 4, 5, 6];

/** Exactly six elements, index 0 = line 1 (bottom). */
export type Six<T> = readonly [T, T, T, T, T, T];

export type HexagramVector = Six<Polarity>;

export type LineSequence = Six<LineValue>;

/** King Wen sequence number, 1-64. */
export type HexagramId = number;

export const HEXAGRAM_COUNT = 64;
