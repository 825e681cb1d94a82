/**
 * Zod schema for the interpretive text corpus (YAML).
 */
import { z } from 'zod';

/** Judgment or image text. */
export const TextBlockSchema = z.object({
  text: z.string(),
  commentary: z.string().optional(),
});

export const LineTextSchema = z.object({
  text: z.string(),
  comments: z.string().optional(),
});

export const HexagramTextSchema = z.object({
  /** English name (e.g., "The Creative") */
  name: z.string(),
  chinese: z.string().optional(),
  pinyin: z.string().optional(),
  description: z.string().optional(),
  judgment: TextBlockSchema.optional(),
  image: TextBlockSchema.optional(),
  /** Line texts keyed by position 1-6 */
  lines: z.record(z.string().regex(/^[1-6]$/, 'line keys must be 1-6'), LineTextSchema).optional(),
});

export const CorpusSchema = z.object({
  hexagrams: z.record(
    z.string().regex(/^([1-9]|[1-5][0-9]|6[0-4])$/, 'hexagram keys must be 1-64'),
    HexagramTextSchema
  ),
});

export type TextBlock = z.infer<typeof TextBlockSchema>;
export type LineText = z.infer<typeof LineTextSchema>;
export type HexagramText = z.infer<typeof HexagramTextSchema>;
export type Corpus = z.infer<typeof CorpusSchema>;
