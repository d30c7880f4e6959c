/**
 * framecode — Shared Types
 *
 * Types describing framecode conventions, parse results and the
 * intermediate runs of the range codec.
 */

/**
 * Identifier of a framecode convention, in detection priority order:
 *
 * - `format_code`: a format specifier with zero fill, e.g. `{:04d}`
 * - `modulo`: a printf-style specifier with zero fill, e.g. `%04d`
 * - `hash`: the last run of `#` characters, one per digit, e.g. `####`
 * - `digits`: the last run of digits, optionally signed, e.g. `0001`
 */
export type ConventionId = 'format_code' | 'modulo' | 'hash' | 'digits';

/** A conversion target: any convention, or a regular expression. */
export type TranslationTarget = ConventionId | 'regex';

/**
 * How a synthesized regex constrains the width of the frame number
 * relative to the width of the framecode it was built from.
 */
export type WidthPolicy = 'any' | 'min' | 'max' | 'exact';

/**
 * A filename or path. A `file:` URL is accepted and converted to a
 * platform path before parsing.
 */
export type FilenameLike = string | URL;

/** A statically defined framecode convention. */
export interface FramecodeConvention {
  id: ConventionId;
  /** Matches the framecode in a filename stem; group 1 carries the width. */
  pattern: RegExp;
  widthOf(captured: string): number;
  /** Absent where no placeholder can be synthesized (raw digits). */
  generate?: (width: number) => string;
}

/** Everything known about the framecode of one filename. */
export interface ParsedFramecode {
  convention: ConventionId;
  matchedText: string;
  matchStart: number;
  matchEnd: number;
  width: number;
  /** Stem text before the first match of the convention's pattern. */
  stemPrefix: string;
  /** Stem text after the last match of the convention's pattern. */
  stemSuffix: string;
  /** Parent directory, or `'.'` for a bare filename. */
  directory: string;
  /** Extension including its dot, or `''`. */
  extension: string;
}

/**
 * An arithmetic run found while formatting numbers.
 * step 0 is a repeated value, step 1 a contiguous range.
 */
export interface RangeRun {
  start: number;
  end: number;
  step: number;
  length: number;
}
