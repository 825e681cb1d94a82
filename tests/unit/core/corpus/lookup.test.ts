/**
 * Tests for corpus text lookup.
 */
import { describe, it, expect } from 'vitest';
import { CorpusTextLookup } from '../../../../src/core/corpus/lookup.js';

describe('CorpusTextLookup', () => {
  const lookup = new CorpusTextLookup({
    hexagrams: {
      '1': {
        name: 'Test Creative',
        judgment: { text: 'Test judgment.' },
        lines: {
          '1': { text: 'Test line one.', comments: 'Test comment.' },
        },
      },
      '2': { name: 'Test Receptive' },
    },
  });

  it('should count entries', () => {
    expect(lookup.size).toBe(2);
  });

  it('should find hexagrams by number', () => {
    expect(lookup.getHexagram(1)?.name).toBe('Test Creative');
    expect(lookup.getHexagram(2)?.judgment).toBeUndefined();
    expect(lookup.getHexagram(3)).toBeUndefined();
  });

  it('should find line texts by hexagram and position', () => {
    expect(lookup.getLine(1, 1)).toEqual({ text: 'Test line one.', comments: 'Test comment.' });
    expect(lookup.getLine(1, 2)).toBeUndefined();
    expect(lookup.getLine(2, 1)).toBeUndefined();
    expect(lookup.getLine(9, 1)).toBeUndefined();
  });
});
