/**
 * Merges a reading with corpus texts: the primary hexagram, the primary's
 * text for each changing line, and the transformed hexagram.
 */
import { formatVector, idToGlyph, idToVector } from '../hexagram/codec.js';
import { lowerTrigram, upperTrigram, type Trigram } from '../hexagram/trigrams.js';
import type { HexagramId } from '../hexagram/types.js';
import type { TextBlock } from '../corpus/schema.js';
import type { TextLookup } from '../corpus/lookup.js';
import type { Reading } from '../reading/types.js';
import type {
  ChangingLine,
  HexagramSummary,
  Interpretation,
  JsonHexagram,
  JsonReading,
  JsonTextBlock,
  JsonTrigram,
} from './types.js';

function summarize(id: HexagramId, lookup: TextLookup): HexagramSummary {
  const vector = idToVector(id);
  return {
    number: id,
    glyph: idToGlyph(id),
    vector,
    lowerTrigram: lowerTrigram(vector),
    upperTrigram: upperTrigram(vector),
    text: lookup.getHexagram(id),
  };
}

export function interpretReading(reading: Reading, lookup: TextLookup): Interpretation {
  const changingLines: ChangingLine[] = reading.changingLines.map((position) => ({
    position,
    value: reading.lines[position - 1],
    text: lookup.getLine(reading.primary, position),
  }));

  return {
    reading,
    primary: summarize(reading.primary, lookup),
    changingLines,
    transformed: reading.transformed === undefined ? undefined : summarize(reading.transformed, lookup),
  };
}

function toJsonBlock(block: TextBlock | undefined): JsonTextBlock | null {
  return block ? { text: block.text, commentary: block.commentary ?? null } : null;
}

function toJsonTrigram(trigram: Trigram): JsonTrigram {
  return {
    name: trigram.name,
    chinese: trigram.chinese,
    unicode: trigram.glyph,
    lines: trigram.lines.map((polarity) => (polarity === 'yang' ? 'Yang' : 'Yin')),
  };
}

function toJsonHexagram(summary: HexagramSummary): JsonHexagram {
  const text = summary.text;
  return {
    number: summary.number,
    unicode: summary.glyph,
    binary: formatVector(summary.vector),
    name: text?.name ?? null,
    chinese: text?.chinese ?? null,
    pinyin: text?.pinyin ?? null,
    description: text?.description ?? null,
    judgment: toJsonBlock(text?.judgment),
    image: toJsonBlock(text?.image),
    upper_trigram: toJsonTrigram(summary.upperTrigram),
    lower_trigram: toJsonTrigram(summary.lowerTrigram),
  };
}

export function toJsonReading(interpretation: Interpretation): JsonReading {
  const { reading } = interpretation;
  return {
    question: reading.question ?? null,
    lines: [...reading.lines],
    changing_positions: [...reading.changingLines],
    primary_hexagram: toJsonHexagram(interpretation.primary),
    changing_lines: interpretation.changingLines.map((line) => ({
      position: line.position,
      value: line.value,
      text: line.text?.text ?? null,
      comments: line.text?.comments ?? null,
    })),
    transformed_hexagram: interpretation.transformed ? toJsonHexagram(interpretation.transformed) : null,
  };
}
