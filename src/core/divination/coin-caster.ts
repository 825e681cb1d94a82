/**
 * Three-coin line casting.
 *
 * Every line is three separate draws from the source, one per coin.
 */
import { cryptoRandomSource, type RandomSource } from './random-source.js';
import type { LineSequence, LineValue } from '../hexagram/types.js';
import { RandomnessFailureError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('caster');

export type CoinFace = 'heads' | 'tails';

export type HeadsCount = 0 | 1 | 2 | 3;

/** The three coins behind one line. */
export interface CoinToss {
  coins: readonly [CoinFace, CoinFace, CoinFace];
  heads: HeadsCount;
  value: LineValue;
}

/**
 * Heads count to line value:
 * 3 → 9 old yang, 2 → 8 young yin, 1 → 7 young yang, 0 → 6 old yin.
 */
export function lineValueForHeads(heads: HeadsCount): LineValue {
  switch (heads) {
    case 3:
      return 9;
    case 2:
      return 8;
    case 1:
      return 7;
    case 0:
      return 6;
  }
}

function countHeads(coins: readonly [CoinFace, CoinFace, CoinFace]): HeadsCount {
  const [a, b, c] = coins.map((coin) => (coin === 'heads' ? 1 : 0));
  const total = a + b + c;
  return total === 3 ? 3 : total === 2 ? 2 : total === 1 ? 1 : 0;
}

export class CoinCaster {
  constructor(private readonly source: RandomSource = cryptoRandomSource) {}

  get sourceName(): string {
    return this.source.name;
  }

  tossCoin(): CoinFace {
    let heads: boolean;
    try {
      heads = this.source.flip();
    } catch (error) {
      throw new RandomnessFailureError(
        ErrorCodes.RANDOMNESS_FAILURE,
        `Random source '${this.source.name}' failed: ${error instanceof Error ? error.message : String(error)}`,
        { source: this.source.name },
        error
      );
    }
    return heads ? 'heads' : 'tails';
  }

  tossLine(): CoinToss {
    const coins = [this.tossCoin(), this.tossCoin(), this.tossCoin()] as const;
    const heads = countHeads(coins);
    const value = lineValueForHeads(heads);
    log.debug('Cast line', { coins, value });
    return { coins, heads, value };
  }

  castLine(): LineValue {
    return this.tossLine().value;
  }

  /**
   * Six lines; the first cast is line 1 (bottom).
   */
  castLines(): LineSequence {
    return [this.castLine(), this.castLine(), this.castLine(), this.castLine(), this.castLine(), this.castLine()];
  }
}
