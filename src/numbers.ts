/**
 * framecode — Range Codec
 *
 * Converts between sequences of integers and compact range strings such
 * as "1-5, 10-16x2, 20, 21".
 *
 * Syntax, in any combination, separated by commas or whitespace:
 *
 * - `A`      the integer A
 * - `A-B`    A to B inclusive
 * - `A-BxC`  A to B inclusive in steps of C
 * - `AxC`    A repeated C times
 */

import {
  EmptyInputError,
  InvalidStepError,
  NonIntegerElementError,
  NotIterableError,
  TypeMismatchError,
  UnsafeIntegerError,
} from './errors';
import type { RangeRun } from './types';

const NUMBER_PATTERN = /(-?\d+)(?:-(-?\d+))?(?:x(-?\d+))?/g;

function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value === 'string') return true;
  return typeof value === 'object' && value !== null && Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Read a run of decimal digits, with an optional leading minus.
 * Throws UnsafeIntegerError past Number.MAX_SAFE_INTEGER, where
 * neighbouring integers are no longer distinct.
 */
export function parseSafeInteger(text: string): number {
  const value = parseInt(text, 10);
  if (!Number.isSafeInteger(value)) {
    throw new UnsafeIntegerError(text);
  }
  return value;
}

/**
 * Strip whitespace that does not separate two numbers.
 * "1 - 5, 7 9" becomes "1-5,7 9".
 */
export function prepare(text: string): string {
  return text.replace(/\s(?!\d)/g, '').replace(/(?<!\d)\s/g, '');
}

/**
 * Integers from start towards stop (exclusive) in increments of step.
 * Nothing is produced when stop lies against the direction of step.
 */
export function* steppedRange(start: number, stop: number, step = 1): Generator<number, void, undefined> {
  if (step === 0) {
    throw new InvalidStepError(step);
  }
  if (step > 0) {
    for (let n = start; n < stop; n += step) yield n;
  } else {
    for (let n = start; n > stop; n += step) yield n;
  }
}

/**
 * Parse a range string into the integers it describes, in order.
 * Unrecognized text between numbers is skipped.
 *
 * The generator is single-pass; parse again to iterate again.
 *
 * @example
 * ```ts
 * [...parseNumbers('1-3, 10-14x2, 7x2')];
 * // [1, 2, 3, 10, 12, 14, 7, 7]
 * ```
 */
export function* parseNumbers(text: string): Generator<number, void, undefined> {
  if (typeof text !== 'string') {
    throw new TypeMismatchError(`Expected a range string, got ${typeof text}`);
  }

  for (const match of prepare(text).matchAll(NUMBER_PATTERN)) {
    const [, first, last, step]: (string | undefined)[] = match;
    if (first === undefined) continue;
    const start = parseSafeInteger(first);

    if (last === undefined && step === undefined) {
      yield start;
    } else if (last === undefined) {
      // AxC
      const count = parseSafeInteger(step ?? '0');
      for (let i = 0; i < count; i++) yield start;
    } else {
      const increment = step === undefined ? 1 : parseSafeInteger(step);
      const end = parseSafeInteger(last);
      yield* steppedRange(start, increment > 0 ? end + 1 : end - 1, increment);
    }
  }
}

function buildRun(run: RangeRun): string {
  if (run.step === 0) {
    return `${run.start}x${run.length}`;
  }
  if (run.step === 1) {
    return `${run.start}-${run.end}`;
  }
  return `${run.start}-${run.end}x${run.step}`;
}

function startRun(start: number, end: number): RangeRun {
  return { start, end, step: end - start, length: 2 };
}

/** A two-element run left at the end: a repeat, or two separate values. */
function flushPair(run: RangeRun): string[] {
  return run.step === 0 ? [buildRun(run)] : [String(run.start), String(run.end)];
}

/**
 * Format integers as a compact range string.
 *
 * Runs are found greedily in input order; the input is not sorted, so
 * duplicates and descending runs are encoded as they appear.
 *
 * @example
 * ```ts
 * formatNumbers([1, 2, 3, 7, 9]);     // '1-3, 7, 9'
 * formatNumbers([10, 12, 14, 14]);    // '10-14x2, 14'
 * formatNumbers([5, 5, 5]);           // '5x3'
 * ```
 */
export function formatNumbers(numbers: Iterable<number>): string {
  if (!isIterable(numbers)) {
    throw new NotIterableError();
  }

  const iterator = numbers[Symbol.iterator]();
  let index = 0;

  function next(): number | undefined {
    const item = iterator.next();
    if (item.done) return undefined;
    const value: unknown = item.value;
    if (!isInteger(value)) {
      throw new NonIntegerElementError(value, index);
    }
    if (!Number.isSafeInteger(value)) {
      throw new UnsafeIntegerError(value);
    }
    index++;
    return value;
  }

  const first = next();
  if (first === undefined) {
    throw new EmptyInputError('Numbers');
  }
  const second = next();
  if (second === undefined) {
    return String(first);
  }
  let upcoming = next();
  if (upcoming === undefined) {
    return first === second ? `${first}x2` : `${first}, ${second}`;
  }

  const output: string[] = [];
  let run = startRun(first, second);

  for (;;) {
    if (upcoming === run.start + run.step * run.length) {
      run.end = upcoming;
      run.length++;
      upcoming = next();
      if (upcoming === undefined) {
        output.push(buildRun(run));
        break;
      }
      continue;
    }

    if (run.length >= 3 || run.step === 0) {
      // A sequence or a repeat ends here; start over from upcoming
      output.push(buildRun(run));
      const following = next();
      if (following === undefined) {
        output.push(String(upcoming));
        break;
      }
      run = startRun(upcoming, following);
    } else {
      // Two unrelated numbers; slide the window by one
      output.push(String(run.start));
      run = startRun(run.end, upcoming);
    }

    upcoming = next();
    if (upcoming === undefined) {
      output.push(...flushPair(run));
      break;
    }
  }

  return output.join(', ');
}
