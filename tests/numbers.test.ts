import { describe, it, expect } from 'vitest';
import { formatNumbers, parseNumbers, parseSafeInteger, prepare, steppedRange } from '../src/numbers';
import {
  EmptyInputError,
  InvalidStepError,
  NonIntegerElementError,
  NotIterableError,
  UnsafeIntegerError,
} from '../src/errors';

function parse(text: string): number[] {
  return [...parseNumbers(text)];
}

describe('numbers', () => {
  describe('prepare', () => {
    it('keeps only whitespace between two numbers', () => {
      expect(prepare('1 - 5, 7 9')).toBe('1-5,7 9');
    });

    it('strips whitespace around a sign', () => {
      expect(prepare('10 - -2')).toBe('10--2');
    });
  });

  describe('parseSafeInteger', () => {
    it('reads signed digit runs', () => {
      expect(parseSafeInteger('0042')).toBe(42);
      expect(parseSafeInteger('-0005')).toBe(-5);
      expect(parseSafeInteger('9007199254740991')).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('rejects integers past the safe range', () => {
      expect(() => parseSafeInteger('9007199254740992')).toThrow(UnsafeIntegerError);
      expect(() => parseSafeInteger('-9007199254740992')).toThrow(UnsafeIntegerError);
    });
  });

  describe('steppedRange', () => {
    it('excludes the stop value', () => {
      expect([...steppedRange(1, 4)]).toEqual([1, 2, 3]);
      expect([...steppedRange(4, 1, -1)]).toEqual([4, 3, 2]);
    });

    it('yields nothing against the direction of the step', () => {
      expect([...steppedRange(5, 1, 1)]).toEqual([]);
    });

    it('rejects a zero step', () => {
      expect(() => [...steppedRange(1, 5, 0)]).toThrow(InvalidStepError);
    });
  });

  describe('parseNumbers', () => {
    it('parses a mixed range string', () => {
      expect(parse('1-5, 10-16x2, 20, 21')).toEqual([1, 2, 3, 4, 5, 10, 12, 14, 16, 20, 21]);
    });

    it('parses repeats', () => {
      expect(parse('7x3')).toEqual([7, 7, 7]);
      expect(parse('3x0')).toEqual([]);
    });

    it('parses descending ranges with a negative step', () => {
      expect(parse('5-1x-2')).toEqual([5, 3, 1]);
    });

    it('yields nothing for a range running against its step', () => {
      expect(parse('5-1')).toEqual([]);
    });

    it('parses negative numbers', () => {
      expect(parse('-3--1')).toEqual([-3, -2, -1]);
      expect(parse('-1-1')).toEqual([-1, 0, 1]);
      expect(parse('-4')).toEqual([-4]);
    });

    it('accepts whitespace as a separator', () => {
      expect(parse('1 2 3')).toEqual([1, 2, 3]);
      expect(parse('1 - 3')).toEqual([1, 2, 3]);
    });

    it('skips text it does not understand', () => {
      expect(parse('frames 1-3 and 9')).toEqual([1, 2, 3, 9]);
      expect(parse('')).toEqual([]);
    });

    it('rejects a zero step when iterated', () => {
      expect(() => parse('1-10x0')).toThrow(InvalidStepError);
    });

    it('rejects numbers past the safe integer range', () => {
      expect(() => parse('9007199254740992-9007199254740994')).toThrow(UnsafeIntegerError);
      expect(() => parse('1-9007199254740994')).toThrow(UnsafeIntegerError);
      expect(() => parse('7x9007199254740992')).toThrow(UnsafeIntegerError);
    });

    it('stops at the largest safe integer', () => {
      expect(parse('9007199254740989-9007199254740991')).toEqual([
        9007199254740989, 9007199254740990, 9007199254740991,
      ]);
    });

    it('is single-pass', () => {
      const numbers = parseNumbers('1-3');
      expect([...numbers]).toEqual([1, 2, 3]);
      expect([...numbers]).toEqual([]);
    });

    it('expands A-BxC to the arithmetic progression', () => {
      for (const [start, step] of [[1, 1], [-4, 3], [10, -3], [0, 7]]) {
        for (let k = 0; k <= 4; k++) {
          const end = start + step * k;
          const expected = Array.from({ length: k + 1 }, (_, i) => start + step * i);
          expect(parse(`${start}-${end}x${step}`)).toEqual(expected);
        }
      }
    });
  });

  describe('formatNumbers', () => {
    it('formats short inputs', () => {
      expect(formatNumbers([5])).toBe('5');
      expect(formatNumbers([5, 5])).toBe('5x2');
      expect(formatNumbers([1, 2])).toBe('1, 2');
    });

    it('formats runs', () => {
      expect(formatNumbers([1, 2, 3])).toBe('1-3');
      expect(formatNumbers([1, 3, 5])).toBe('1-5x2');
      expect(formatNumbers([1, 2, 3, 7, 9])).toBe('1-3, 7, 9');
      expect(formatNumbers([5, 5, 5])).toBe('5x3');
    });

    it('keeps input order', () => {
      expect(formatNumbers([3, 2, 1])).toBe('3-1x-1');
      expect(formatNumbers([1, 2, 4, 8])).toBe('1, 2, 4, 8');
    });

    it('formats a trailing repeat after a run', () => {
      expect(formatNumbers([1, 1, 1, 5, 5])).toBe('1x3, 5x2');
      expect(formatNumbers([1, 2, 3, 4, 4, 4])).toBe('1-4, 4x2');
    });

    it('formats a single value after a run', () => {
      expect(formatNumbers([10, 12, 14, 14])).toBe('10-14x2, 14');
      expect(formatNumbers([1, 5, 5, 5])).toBe('1, 5x3');
    });

    it('formats negative numbers', () => {
      expect(formatNumbers([-3, -2, -1])).toBe('-3--1');
      expect(formatNumbers([-2, -2])).toBe('-2x2');
    });

    it('accepts any iterable', () => {
      expect(formatNumbers(new Set([4, 5, 6]))).toBe('4-6');
      expect(formatNumbers(parseNumbers('1-3, 7'))).toBe('1-3, 7');
    });

    it('throws EmptyInputError for no numbers', () => {
      expect(() => formatNumbers([])).toThrow(EmptyInputError);
    });

    it('throws NonIntegerElementError with the position', () => {
      let caught: unknown;
      try {
        formatNumbers([1, 2.5, 3]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(NonIntegerElementError);
      expect(caught).toMatchObject({ element: 2.5, index: 1 });
    });

    it('throws UnsafeIntegerError for integers past the safe range', () => {
      expect(() => formatNumbers([2 ** 53, 2 ** 53 + 2, 2 ** 53 + 4])).toThrow(UnsafeIntegerError);
      expect(() => formatNumbers([1, -(2 ** 53)])).toThrow('-9007199254740992 is outside the safe integer range');
    });

    it('throws NotIterableError for non-iterables', () => {
      expect(() => formatNumbers(42 as unknown as Iterable<number>)).toThrow(NotIterableError);
    });
  });

  describe('round trip', () => {
    it.each([
      '1-3, 7, 9',
      '1-5x2',
      '5x2',
      '1x3, 5x2',
      '3-1x-1',
      '-3--1',
      '10-14x2, 14',
      '1, 2, 4, 8',
      '1-10, 20-50x10, 51',
    ])('formats %s back to itself', text => {
      expect(formatNumbers(parseNumbers(text))).toBe(text);
    });
  });
});
