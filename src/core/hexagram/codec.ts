/**
 * Conversions between King Wen number, line vector and Unicode glyph.
 *
 * The Yijing Hexagram Symbols block (U+4DC0..U+4DFF) is itself laid out in
 * King Wen order, so the glyph is an offset from the number, while the
 * vector needs the sequence table.
 */
import {
  ErrorCodes,
  MalformedTransitionError,
  OutOfRangeReferenceError,
  SystemError,
  UnrecognizedGlyphError,
} from '../../utils/errors.js';
import { LINE_POSITIONS, type HexagramId, type HexagramVector, type LinePosition, type Polarity } from './types.js';
import { isHexagramId, isPolarity, mapSix, oppositePolarity } from './lines.js';
import { SEQUENCE_TABLE, vectorToBits } from './sequence.js';

export const GLYPH_BASE = 0x4dc0;
export const GLYPH_LAST = 0x4dff;

function assertHexagramId(id: unknown): asserts id is HexagramId {
  if (!isHexagramId(id)) {
    throw new OutOfRangeReferenceError(
      ErrorCodes.OUT_OF_RANGE_REFERENCE,
      `Hexagram number out of range: ${String(id)} (expected 1-64)`,
      { input: id }
    );
  }
}

export function idToVector(id: HexagramId): HexagramVector {
  assertHexagramId(id);
  return SEQUENCE_TABLE.vectors[id - 1];
}

export function vectorToId(vector: readonly Polarity[]): HexagramId {
  if (vector.length !== 6 || !vector.every(isPolarity)) {
    throw new OutOfRangeReferenceError(
      ErrorCodes.INVALID_HEXAGRAM_REFERENCE,
      `Invalid hexagram reference: expected six yin/yang lines, got ${JSON.stringify(vector)}`,
      { input: vector }
    );
  }

  const bits = vectorToBits(vector);
  const id = SEQUENCE_TABLE.idsByBits.get(bits);
  if (id === undefined) {
    throw new SystemError(
      ErrorCodes.INVALID_SEQUENCE_TABLE,
      `Hexagram sequence table has no entry for line pattern ${bits.toString(2).padStart(6, '0')}`,
      { bits }
    );
  }
  return id;
}

export function idToGlyph(id: HexagramId): string {
  assertHexagramId(id);
  return String.fromCodePoint(GLYPH_BASE + id - 1);
}

export function isHexagramGlyph(value: string): boolean {
  const chars = Array.from(value);
  if (chars.length !== 1) return false;
  const codePoint = chars[0].codePointAt(0);
  return codePoint !== undefined && codePoint >= GLYPH_BASE && codePoint <= GLYPH_LAST;
}

export function glyphToId(glyph: string): HexagramId {
  if (!isHexagramGlyph(glyph)) {
    throw new UnrecognizedGlyphError(
      ErrorCodes.UNRECOGNIZED_GLYPH,
      `Unrecognized hexagram glyph: '${glyph}' (expected one character from ䷀ to ䷿)`,
      { input: glyph }
    );
  }
  return (glyph.codePointAt(0) ?? GLYPH_BASE) - GLYPH_BASE + 1;
}

/**
 * Flip polarity at exactly the given positions.
 */
export function flipVector(vector: HexagramVector, positions: readonly LinePosition[]): HexagramVector {
  return mapSix(vector, (polarity, position) =>
    positions.includes(position) ? oppositePolarity(polarity) : polarity
  );
}

/**
 * Positions (ascending) where two vectors disagree.
 */
export function changedPositions(from: HexagramVector, to: HexagramVector): LinePosition[] {
  return LINE_POSITIONS.filter((position) => from[position - 1] !== to[position - 1]);
}

/**
 * Check a (primary, transformed) pair before building a reading from it.
 * Identical hexagrams are rejected: a transition that names no change is
 * malformed, and the plain number notation already covers that reading.
 */
export function assertTransition(primary: HexagramId, transformed: HexagramId, input: string): void {
  assertHexagramId(primary);
  assertHexagramId(transformed);
  if (primary === transformed) {
    throw new MalformedTransitionError(
      ErrorCodes.IDENTICAL_HEXAGRAMS,
      `Transition '${input}' names the same hexagram on both sides; use '${primary}' for a reading without changing lines`,
      { input, primary, transformed }
    );
  }
}

/**
 * Six-character `0`/`1` pattern, bottom line first.
 */
export function formatVector(vector: HexagramVector): string {
  return vector.map((polarity) => (polarity === 'yang' ? '1' : '0')).join('');
}
