/**
 * Interpretation type definitions.
 */
import type { HexagramId, HexagramVector, LinePosition, LineValue } from '../hexagram/types.js';
import type { Trigram } from '../hexagram/trigrams.js';
import type { HexagramText, LineText } from '../corpus/schema.js';
import type { Reading } from '../reading/types.js';

export interface HexagramSummary {
  number: HexagramId;
  glyph: string;
  vector: HexagramVector;
  lowerTrigram: Trigram;
  upperTrigram: Trigram;
  /** Undefined when the corpus has no entry for this hexagram */
  text?: HexagramText;
}

export interface ChangingLine {
  position: LinePosition;
  value: LineValue;
  /** Line text of the primary hexagram at this position */
  text?: LineText;
}

/**
 * A reading merged with corpus texts, ready for formatting.
 */
export interface Interpretation {
  reading: Reading;
  primary: HexagramSummary;
  changingLines: ChangingLine[];
  transformed?: HexagramSummary;
}

export interface JsonTextBlock {
  text: string;
  commentary: string | null;
}

export interface JsonTrigram {
  name: string;
  chinese: string;
  unicode: string;
  lines: string[];
}

export interface JsonHexagram {
  number: number;
  unicode: string;
  binary: string;
  name: string | null;
  chinese: string | null;
  pinyin: string | null;
  description: string | null;
  judgment: JsonTextBlock | null;
  image: JsonTextBlock | null;
  upper_trigram: JsonTrigram;
  lower_trigram: JsonTrigram;
}

export interface JsonLineInterpretation {
  position: number;
  value: number;
  text: string | null;
  comments: string | null;
}

/**
 * Machine-readable reading, shared by the CLI and the tool server.
 */
export interface JsonReading {
  question: string | null;
  lines: number[];
  changing_positions: number[];
  primary_hexagram: JsonHexagram;
  changing_lines: JsonLineInterpretation[];
  transformed_hexagram: JsonHexagram | null;
}
