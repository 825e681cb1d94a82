/**
 * Normalizes the accepted reading notations into a canonical input:
 *
 * - hexagram number:      `32`
 * - hexagram glyph:       `䷟`
 * - explicit line values: `7,8,9,6,7,8` (bottom line first)
 * - changing hexagrams:   `32→34`, `32->34`, `䷟→䷡`
 */
import {
  ErrorCodes,
  IChingError,
  MalformedTransitionError,
  OutOfRangeReferenceError,
  UnrecognizedGlyphError,
} from '../../utils/errors.js';
import { assertTransition, glyphToId, idToVector } from '../hexagram/codec.js';
import { isHexagramId, mapSix, stableLineFor, toLineSequence } from '../hexagram/lines.js';
import type { HexagramId, LineSequence } from '../hexagram/types.js';

export type CanonicalInput =
  | { readonly kind: 'lines'; readonly lines: LineSequence }
  | { readonly kind: 'transition'; readonly primary: HexagramId; readonly transformed: HexagramId };

export const TRANSITION_ARROWS = ['→', '->'] as const;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const LINE_TOKEN_PATTERN = /^\d+$/;

const EXPECTED_NOTATIONS =
  'Expected a hexagram number (1-64), a hexagram character (䷀-䷿), ' +
  'six comma-separated line values (6-9), or a change such as 32→34';

/**
 * Resolve a single hexagram reference: a number in [1,64] or one glyph.
 */
export function parseHexagramReference(raw: string): HexagramId {
  const reference = raw.trim();

  if (INTEGER_PATTERN.test(reference)) {
    const value = Number(reference);
    if (!isHexagramId(value)) {
      throw new OutOfRangeReferenceError(
        ErrorCodes.OUT_OF_RANGE_REFERENCE,
        `Hexagram number out of range: ${reference} (expected 1-64)`,
        { input: raw }
      );
    }
    return value;
  }

  if (Array.from(reference).length === 1) {
    return glyphToId(reference);
  }

  throw new UnrecognizedGlyphError(
    ErrorCodes.UNRECOGNIZED_INPUT,
    `Unrecognized input: '${raw}'. ${EXPECTED_NOTATIONS}`,
    { input: raw }
  );
}

/**
 * Parse `7,8,9,6,7,8` into six line values, bottom line first.
 */
export function parseLineSequence(raw: string): LineSequence {
  const tokens = raw.split(',').map((token) => token.trim());
  const values = tokens.map((token) => (LINE_TOKEN_PATTERN.test(token) ? Number(token) : token));
  return toLineSequence(values, raw);
}

/**
 * All-stable lines for a hexagram: 7 for each yang line, 8 for each yin line.
 */
export function stableLinesFor(id: HexagramId): LineSequence {
  return mapSix(idToVector(id), stableLineFor);
}

function findArrow(input: string): { index: number; length: number } | null {
  let found: { index: number; length: number } | null = null;
  for (const arrow of TRANSITION_ARROWS) {
    const index = input.indexOf(arrow);
    if (index !== -1 && (found === null || index < found.index)) {
      found = { index, length: arrow.length };
    }
  }
  return found;
}

function resolveTransitionSide(side: 'primary' | 'transformed', reference: string, input: string): HexagramId {
  try {
    return parseHexagramReference(reference);
  } catch (error) {
    if (error instanceof IChingError) {
      throw new MalformedTransitionError(
        ErrorCodes.MALFORMED_TRANSITION,
        `Malformed transition '${input}': ${side} hexagram '${reference}' could not be resolved (${error.message})`,
        { input, side, reference, cause: error.code },
        error
      );
    }
    throw error;
  }
}

/**
 * Parse changing-hexagram notation. Splits at the first arrow, so any
 * further arrow lands in the right-hand reference and fails there.
 */
export function parseTransition(raw: string): CanonicalInput {
  const input = raw.trim();
  const arrow = findArrow(input);
  if (!arrow) {
    throw new MalformedTransitionError(
      ErrorCodes.MALFORMED_TRANSITION,
      `Malformed transition '${raw}': expected two hexagrams separated by → or ->`,
      { input: raw }
    );
  }

  const left = input.slice(0, arrow.index).trim();
  const right = input.slice(arrow.index + arrow.length).trim();
  const primary = resolveTransitionSide('primary', left, raw);
  const transformed = resolveTransitionSide('transformed', right, raw);
  assertTransition(primary, transformed, raw);

  return { kind: 'transition', primary, transformed };
}

/**
 * Parse any accepted notation. Arrows win over commas, commas over a
 * single reference.
 */
export function parseInput(raw: string): CanonicalInput {
  const input = raw.trim();

  if (findArrow(input)) {
    return parseTransition(input);
  }

  if (input.includes(',')) {
    return { kind: 'lines', lines: parseLineSequence(input) };
  }

  return { kind: 'lines', lines: stableLinesFor(parseHexagramReference(input)) };
}
