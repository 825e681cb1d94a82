/**
 * Shared interpretations for formatter tests.
 */
import { CorpusTextLookup } from '../../../../src/core/corpus/lookup.js';
import { interpretReading } from '../../../../src/core/interpretation/interpret.js';
import { buildFromLines } from '../../../../src/core/reading/builder.js';
import type { Interpretation } from '../../../../src/core/interpretation/types.js';
import type { LineSequence } from '../../../../src/core/hexagram/types.js';

export const testLookup = new CorpusTextLookup({
  hexagrams: {
    '63': {
      name: 'Test After',
      chinese: '既濟',
      pinyin: 'Ji Ji',
      description: 'Test description.',
      judgment: { text: 'Test judgment.', commentary: 'Test commentary.' },
      image: { text: 'Test image.' },
      lines: {
        '3': { text: 'Test line three.', comments: 'Test comments.' },
      },
    },
    '17': {
      name: 'Test Following',
      judgment: { text: 'Test transformed judgment.' },
    },
  },
});

const emptyLookup = new CorpusTextLookup({ hexagrams: {} });

/** 7,8,9,6,7,8: hexagram 63 changing at lines 3 and 4 into 17 */
export function changingInterpretation(question?: string): Interpretation {
  return interpretReading(buildFromLines([7, 8, 9, 6, 7, 8], question), testLookup);
}

export function interpretationWithoutTexts(lines: LineSequence = [7, 7, 7, 7, 7, 7]): Interpretation {
  return interpretReading(buildFromLines(lines), emptyLookup);
}
