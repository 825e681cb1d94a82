/**
 * Entropy sources for the coin toss.
 */
import { randomInt } from 'node:crypto';

/**
 * One fair binary draw per `flip()` call; `true` is heads.
 */
export interface RandomSource {
  readonly name: string;
  flip(): boolean;
}

export type RandomSourceName = 'crypto' | 'math';

/** Operating-system entropy via node:crypto. */
export const cryptoRandomSource: RandomSource = {
  name: 'crypto',
  flip: () => randomInt(2) === 1,
};

export const mathRandomSource: RandomSource = {
  name: 'math',
  flip: () => Math.random() < 0.5,
};

export function getRandomSource(name: RandomSourceName): RandomSource {
  switch (name) {
    case 'crypto':
      return cryptoRandomSource;
    case 'math':
      return mathRandomSource;
  }
}
