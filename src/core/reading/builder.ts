/**
 * Builds readings from line values, from a (primary, transformed) pair,
 * or from six fresh coin casts.
 */
import { assertTransition, flipVector, idToVector, vectorToId } from '../hexagram/codec.js';
import {
  changingLineFor,
  isChanging,
  mapSix,
  polarityOf,
  stableLineFor,
  toLineSequence,
} from '../hexagram/lines.js';
import { LINE_POSITIONS, type HexagramId, type LineSequence, type Six } from '../hexagram/types.js';
import type { CoinCaster } from '../divination/coin-caster.js';
import type { CanonicalInput } from '../notation/normalizer.js';
import type { Reading } from './types.js';

function freezeSix<T>(six: Six<T>): Six<T> {
  Object.freeze(six);
  return six;
}

function normalizeQuestion(question: string | undefined): string | undefined {
  const trimmed = question?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Derive the primary hexagram, the changing lines and, when any line
 * changes, the transformed hexagram.
 */
export function buildFromLines(lines: LineSequence, question?: string): Reading {
  const checked = freezeSix(toLineSequence(lines));
  const primaryVector = freezeSix(mapSix(checked, polarityOf));
  const changingLines = Object.freeze(LINE_POSITIONS.filter((position) => isChanging(checked[position - 1])));
  const normalizedQuestion = normalizeQuestion(question);

  const reading: Reading = {
    lines: checked,
    primary: vectorToId(primaryVector),
    primaryVector,
    changingLines,
    ...(normalizedQuestion ? { question: normalizedQuestion } : {}),
  };

  if (changingLines.length === 0) {
    return Object.freeze(reading);
  }

  const transformedVector = freezeSix(flipVector(primaryVector, changingLines));
  return Object.freeze({
    ...reading,
    transformed: vectorToId(transformedVector),
    transformedVector,
  });
}

/**
 * Reconstruct line values from a transition.
 *
 * Lines that agree become young (7 yang, 8 yin); lines that differ become
 * old in the primary's polarity (9 yang, 6 yin). The coin history behind
 * each line cannot be recovered from two hexagram numbers, only polarity
 * and stability can.
 */
export function buildFromTransition(primary: HexagramId, transformed: HexagramId, question?: string): Reading {
  assertTransition(primary, transformed, `${primary}→${transformed}`);

  const to = idToVector(transformed);
  const lines = mapSix(idToVector(primary), (polarity, position) =>
    polarity === to[position - 1] ? stableLineFor(polarity) : changingLineFor(polarity)
  );

  return buildFromLines(lines, question);
}

/**
 * Cast six lines with the coin caster, bottom line first.
 */
export function castReading(caster: CoinCaster, question?: string): Reading {
  return buildFromLines(caster.castLines(), question);
}

export function buildFromInput(input: CanonicalInput, question?: string): Reading {
  switch (input.kind) {
    case 'lines':
      return buildFromLines(input.lines, question);
    case 'transition':
      return buildFromTransition(input.primary, input.transformed, question);
  }
}
