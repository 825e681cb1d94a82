/**
 * Read-only text lookup keyed by hexagram number and line position.
 */
import type { HexagramId, LinePosition } from '../hexagram/types.js';
import type { Corpus, HexagramText, LineText } from './schema.js';

export interface TextLookup {
  getHexagram(id: HexagramId): HexagramText | undefined;
  getLine(id: HexagramId, position: LinePosition): LineText | undefined;
}

export class CorpusTextLookup implements TextLookup {
  private readonly entries: ReadonlyMap<HexagramId, HexagramText>;

  constructor(corpus: Corpus) {
    this.entries = new Map(
      Object.entries(corpus.hexagrams).map(([key, text]): [HexagramId, HexagramText] => [Number(key), text])
    );
  }

  /** Number of hexagrams with an entry. */
  get size(): number {
    return this.entries.size;
  }

  getHexagram(id: HexagramId): HexagramText | undefined {
    return this.entries.get(id);
  }

  getLine(id: HexagramId, position: LinePosition): LineText | undefined {
    return this.entries.get(id)?.lines?.[String(position)];
  }
}
