/**
 * Reading type definitions.
 */
import type { HexagramId, HexagramVector, LinePosition, LineSequence } from '../hexagram/types.js';

/**
 * A complete divination result. Built in one pass and frozen; there is no
 * partially populated reading.
 */
export interface Reading {
  /** The six line values, bottom line first */
  readonly lines: LineSequence;
  readonly primary: HexagramId;
  readonly primaryVector: HexagramVector;
  /** Positions holding a 6 or a 9, ascending */
  readonly changingLines: readonly LinePosition[];
  /** Present if and only if there is at least one changing line */
  readonly transformed?: HexagramId;
  readonly transformedVector?: HexagramVector;
  readonly question?: string;
}
