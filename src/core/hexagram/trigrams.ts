/**
 * The eight trigrams. A hexagram's lower trigram is lines 1-3, its upper
 * trigram lines 4-6.
 */
import type { HexagramVector, Polarity } from './types.js';
import { vectorToBits } from './sequence.js';

export type TrigramKey = 'heaven' | 'lake' | 'fire' | 'thunder' | 'wind' | 'water' | 'mountain' | 'earth';

export interface Trigram {
  key: TrigramKey;
  /** English image (e.g., "Heaven") */
  name: string;
  chinese: string;
  pinyin: string;
  /** Unicode trigram symbol, U+2630..U+2637 */
  glyph: string;
  attribute: string;
  /** Bottom line first */
  lines: readonly [Polarity, Polarity, Polarity];
}

// Indexed by line bits: bottom line is bit 0, yang sets the bit.
const TRIGRAMS_BY_BITS: readonly Trigram[] = [
  { key: 'earth', name: 'Earth', chinese: '坤', pinyin: 'Kun', glyph: '☷', attribute: 'receptive, devoted', lines: ['yin', 'yin', 'yin'] },
  { key: 'thunder', name: 'Thunder', chinese: '震', pinyin: 'Zhen', glyph: '☳', attribute: 'arousing, inciting movement', lines: ['yang', 'yin', 'yin'] },
  { key: 'water', name: 'Water', chinese: '坎', pinyin: 'Kan', glyph: '☵', attribute: 'abysmal, dangerous', lines: ['yin', 'yang', 'yin'] },
  { key: 'lake', name: 'Lake', chinese: '兌', pinyin: 'Dui', glyph: '☱', attribute: 'joyous, joyful', lines: ['yang', 'yang', 'yin'] },
  { key: 'mountain', name: 'Mountain', chinese: '艮', pinyin: 'Gen', glyph: '☶', attribute: 'keeping still, resting', lines: ['yin', 'yin', 'yang'] },
  { key: 'fire', name: 'Fire', chinese: '離', pinyin: 'Li', glyph: '☲', attribute: 'clinging, light-giving', lines: ['yang', 'yin', 'yang'] },
  { key: 'wind', name: 'Wind', chinese: '巽', pinyin: 'Xun', glyph: '☴', attribute: 'gentle, penetrating', lines: ['yin', 'yang', 'yang'] },
  { key: 'heaven', name: 'Heaven', chinese: '乾', pinyin: 'Qian', glyph: '☰', attribute: 'creative, strong', lines: ['yang', 'yang', 'yang'] },
];

export function trigramOf(lines: readonly [Polarity, Polarity, Polarity]): Trigram {
  return TRIGRAMS_BY_BITS[vectorToBits(lines)];
}

export function lowerTrigram(vector: HexagramVector): Trigram {
  return trigramOf([vector[0], vector[1], vector[2]]);
}

export function upperTrigram(vector: HexagramVector): Trigram {
  return trigramOf([vector[3], vector[4], vector[5]]);
}

export function listTrigrams(): readonly Trigram[] {
  return TRIGRAMS_BY_BITS;
}
