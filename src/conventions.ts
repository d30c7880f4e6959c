/**
 * framecode — Convention Registry
 *
 * The closed set of framecode conventions, listed in detection priority
 * order. Detection runs on a filename stem (no directory, no extension).
 */

import { UnsupportedConventionError } from './errors';
import type { ConventionId, FramecodeConvention } from './types';

const parseWidth = (captured: string): number => parseInt(captured, 10);
const lengthWidth = (captured: string): number => captured.length;

export const CONVENTIONS: readonly FramecodeConvention[] = [
  {
    id: 'format_code',
    // {:04d}, fill must be '0' and width non-zero
    pattern: /\{:0+([1-9]\d*)d*\}/,
    widthOf: parseWidth,
    generate: width => `{:0${width}d}`,
  },
  {
    id: 'modulo',
    // %04d
    pattern: /%0+([1-9]\d*)d/,
    widthOf: parseWidth,
    generate: width => `%0${width}d`,
  },
  {
    id: 'hash',
    // last run of '#'
    pattern: /(#+)(?!.*#)/,
    widthOf: lengthWidth,
    generate: width => '#'.repeat(width),
  },
  {
    id: 'digits',
    // last run of digits, a leading '-' counts toward the width
    pattern: /(-?\d+)(?!.*\d)/,
    widthOf: lengthWidth,
  },
];

const BY_ID = new Map<string, FramecodeConvention>(CONVENTIONS.map(c => [c.id, c]));

export interface Detection {
  convention: FramecodeConvention;
  match: RegExpExecArray;
}

export function isConventionId(value: unknown): value is ConventionId {
  return typeof value === 'string' && BY_ID.has(value);
}

export function getConvention(id: ConventionId): FramecodeConvention {
  const convention = BY_ID.get(id);
  if (!convention) {
    throw new UnsupportedConventionError(id);
  }
  return convention;
}

/**
 * Find the framecode in a stem. The first convention, in priority order,
 * whose pattern matches wins.
 */
export function detect(stem: string): Detection | undefined {
  for (const convention of CONVENTIONS) {
    const match = convention.pattern.exec(stem);
    if (match) {
      return { convention, match };
    }
  }
  return undefined;
}
