/**
 * Tests for the Cast and Normalize-and-build operations.
 */
import { describe, it, expect } from 'vitest';
import { cast, readingFromNotation } from '../../../../src/core/reading/operations.js';
import { CoinCaster } from '../../../../src/core/divination/coin-caster.js';
import { ErrorCodes, MalformedLineSequenceError } from '../../../../src/utils/errors.js';

describe('reading operations', () => {
  describe('cast', () => {
    it('should accept explicit lines as a string', () => {
      const reading = cast({ lines: '7,8,9,6,7,8' });
      expect(reading.primary).toBe(63);
      expect(reading.changingLines).toEqual([3, 4]);
    });

    it('should accept explicit lines as an array', () => {
      const reading = cast({ lines: [6, 6, 6, 6, 6, 6] });
      expect(reading.primary).toBe(2);
      expect(reading.transformed).toBe(1);
    });

    it('should validate explicit lines', () => {
      expect(() => cast({ lines: [7, 8] })).toThrow(MalformedLineSequenceError);
      expect(() => cast({ lines: [7, 8, 9, 6, 7, '8'] })).toThrow('Invalid line value "8" at line 6. Must be 6, 7, 8, or 9');
    });

    it('should cast coins when no lines are given', () => {
      const caster = new CoinCaster({ name: 'tails', flip: () => false });
      const reading = cast({ caster, question: 'Tails?' });

      expect(reading.lines).toEqual([6, 6, 6, 6, 6, 6]);
      expect(reading.question).toBe('Tails?');
    });

    it('should produce a valid reading with the default caster', () => {
      const reading = cast();
      expect(reading.lines).toHaveLength(6);
      expect(reading.primary).toBeGreaterThanOrEqual(1);
      expect(reading.primary).toBeLessThanOrEqual(64);
      expect(reading.transformed === undefined).toBe(reading.changingLines.length === 0);
    });
  });

  describe('readingFromNotation', () => {
    it('should build a transition reading', () => {
      const reading = readingFromNotation('32→34', 'What lasts?');
      expect(reading.lines).toEqual([6, 7, 7, 7, 8, 8]);
      expect(reading.changingLines).toEqual([1]);
      expect(reading.question).toBe('What lasts?');
    });

    it('should build a reading without changes from a number', () => {
      const reading = readingFromNotation('1');
      expect(reading.lines).toEqual([7, 7, 7, 7, 7, 7]);
      expect(reading.transformed).toBeUndefined();
    });

    it('should surface parse errors', () => {
      try {
        readingFromNotation('1,2,3,4,5,6');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedLineSequenceError);
        if (error instanceof MalformedLineSequenceError) {
          expect(error.code).toBe(ErrorCodes.INVALID_LINE_VALUE);
        }
      }
    });
  });
});
