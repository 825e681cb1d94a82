/**
 * Small rendering helpers shared by the formatters.
 */
import type { LineValue } from '../../core/hexagram/types.js';
import type { HexagramSummary } from '../../core/interpretation/types.js';

export const UNKNOWN_NAME = 'Unknown';

/** Traditional line drawing; old lines carry a change marker. */
export function lineSymbol(value: LineValue): string {
  switch (value) {
    case 7:
      return '━━━━━━';
    case 8:
      return '━━  ━━';
    case 9:
      return '━━━━━━ ○';
    case 6:
      return '━━  ━━ ×';
  }
}

export function hexagramName(summary: HexagramSummary): string {
  return summary.text?.name ?? UNKNOWN_NAME;
}

/** `䷟ 32 Duration` */
export function hexagramLabel(summary: HexagramSummary): string {
  return `${summary.glyph} ${summary.number} ${hexagramName(summary)}`;
}

export function chineseLine(summary: HexagramSummary): string | null {
  const text = summary.text;
  if (!text?.chinese) return null;
  return text.pinyin ? `Chinese: ${text.chinese} (${text.pinyin})` : `Chinese: ${text.chinese}`;
}
