/**
 * Tests for entropy sources.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  cryptoRandomSource,
  getRandomSource,
  mathRandomSource,
} from '../../../../src/core/divination/random-source.js';

describe('random sources', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should select sources by name', () => {
    expect(getRandomSource('crypto')).toBe(cryptoRandomSource);
    expect(getRandomSource('math')).toBe(mathRandomSource);
  });

  it('should flip heads below one half with Math.random', () => {
    vi.spyOn(Math, 'random').mockReturnValueOnce(0.3).mockReturnValueOnce(0.7);
    expect(mathRandomSource.flip()).toBe(true);
    expect(mathRandomSource.flip()).toBe(false);
  });

  it('should return booleans from the crypto source', () => {
    const flips = Array.from({ length: 64 }, () => cryptoRandomSource.flip());
    expect(flips.every((flip) => typeof flip === 'boolean')).toBe(true);
  });
});
