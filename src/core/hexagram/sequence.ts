/**
 * King Wen sequence table.
 *
 * The traditional order is historical, not arithmetic, so it is kept as an
 * explicit table (`king-wen.ts`) rather than computed from bit patterns.
 */
import { z } from 'zod';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { HEXAGRAM_COUNT, type HexagramId, type HexagramVector, type Polarity } from './types.js';
import { mapSix, toSix } from './lines.js';
import { KING_WEN_SEQUENCE } from './king-wen.js';

export const SequenceTableSchema = z.object({
  sequence: z
    .array(z.string().regex(/^[01]{6}$/, 'each entry must be six 0/1 digits'))
    .length(HEXAGRAM_COUNT)
    .refine((entries) => new Set(entries).size === entries.length, {
      message: 'entries must be distinct',
    }),
});

export interface SequenceTable {
  /** Vector of hexagram n at index n - 1 */
  readonly vectors: readonly HexagramVector[];
  /** Hexagram id keyed by `vectorToBits` */
  readonly idsByBits: ReadonlyMap<number, HexagramId>;
}

/**
 * Line n (bottom = 1) is bit n - 1; yang sets the bit.
 */
export function vectorToBits(vector: readonly Polarity[]): number {
  return vector.reduce((bits, polarity, index) => (polarity === 'yang' ? bits | (1 << index) : bits), 0);
}

function entryToVector(entry: string, source: string): HexagramVector {
  const six = toSix(Array.from(entry));
  if (!six) {
    throw new SystemError(
      ErrorCodes.INVALID_SEQUENCE_TABLE,
      `Sequence entry '${entry}' is not six lines (file: ${source})`,
      { entry, source }
    );
  }
  return mapSix(six, (digit): Polarity => (digit === '1' ? 'yang' : 'yin'));
}

/**
 * Validate raw table data and index it both ways.
 */
export function parseSequenceTable(raw: unknown, source: string): SequenceTable {
  const result = SequenceTableSchema.safeParse(raw);
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_SEQUENCE_TABLE,
      `Invalid hexagram sequence table: ${formatZodError(result.error)} (file: ${source})`,
      { source, errors: result.error.issues }
    );
  }

  const vectors = result.data.sequence.map((entry) => Object.freeze(entryToVector(entry, source)));
  const idsByBits = new Map<number, HexagramId>();
  vectors.forEach((vector, index) => idsByBits.set(vectorToBits(vector), index + 1));

  return { vectors, idsByBits };
}

/** The King Wen table, validated and indexed once at module load. */
export const SEQUENCE_TABLE: SequenceTable = parseSequenceTable({ sequence: KING_WEN_SEQUENCE }, 'king-wen');
