/**
 * framecode — Parser
 *
 * Detects the framecode in a filename and rewrites it: replacement,
 * translation between conventions and synthesis of a regex that matches
 * every file of the same naming family.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_WIDTH_POLICY, FilenameSchema, WidthPolicySchema, WidthSchema } from './config';
import { detect, getConvention, isConventionId } from './conventions';
import {
  InvalidWidthError,
  InvalidWidthPolicyError,
  NoFramecodeFoundError,
  TypeMismatchError,
  UnsupportedConventionError,
  UnsupportedGenerationError,
} from './errors';
import { createLogger } from './logger';
import { parseSafeInteger } from './numbers';
import type {
  ConventionId,
  FilenameLike,
  FramecodeConvention,
  ParsedFramecode,
  TranslationTarget,
  WidthPolicy,
} from './types';

const log = createLogger('parser');

/** Escape a string for literal use inside a regular expression. */
export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Normalize a filename argument to a path string.
 * Throws TypeMismatchError for anything but a string or a file: URL.
 */
export function toFilename(value: unknown): string {
  const result = FilenameSchema.safeParse(value);
  if (!result.success) {
    throw new TypeMismatchError(`Expected a string or file URL, got ${describeType(value)}`);
  }

  const filename = result.data;
  if (typeof filename === 'string') {
    return filename;
  }
  if (filename.protocol !== 'file:') {
    throw new TypeMismatchError(`Expected a file URL, got '${filename.href}'`);
  }
  return fileURLToPath(filename);
}

/**
 * A directory as a literal path prefix: empty for '.', otherwise ending in
 * one separator. Segments such as '..' are kept as written.
 */
export function directoryPrefix(directory: string): string {
  if (directory === '.') return '';
  return directory.endsWith(path.sep) ? directory : directory + path.sep;
}

/** Join a directory and a name, leaving a bare name bare. */
export function joinPath(directory: string, name: string): string {
  return directoryPrefix(directory) + name;
}

function validatePolicy(policy: unknown): WidthPolicy {
  const result = WidthPolicySchema.safeParse(policy);
  if (!result.success) {
    throw new InvalidWidthPolicyError(policy);
  }
  return result.data;
}

function quantifier(policy: Exclude<WidthPolicy, 'any'>, width: number): string {
  switch (policy) {
    case 'exact':
      return `{${width}}`;
    case 'min':
      return `{${width},}`;
    case 'max':
      return `{1,${width}}`;
  }
}

/**
 * Regex fragment matching a frame number under a width policy.
 *
 * A zero-filled negative number spends one character of its width on the
 * sign: at width 3, 4 is written "004" but -4 is written "-04". The
 * negative branch therefore counts one digit fewer. At width 1 there is
 * no room for a sign, so only 'min' keeps a negative branch.
 */
export function widthFragment(policy: WidthPolicy, width: number): string {
  if (policy === 'any') {
    return '-?\\d+';
  }

  const positive = `\\d${quantifier(policy, width)}`;
  if (width > 1) {
    return `(?:${positive}|-\\d${quantifier(policy, width - 1)})`;
  }
  if (policy === 'min') {
    return `(?:${positive}|-\\d${quantifier(policy, 1)})`;
  }
  return `(?:${positive})`;
}

/**
 * Generate a framecode placeholder of the given width.
 *
 * @example
 * ```ts
 * generateFramecode('modulo', 4);  // '%04d'
 * generateFramecode('hash', 3);    // '###'
 * ```
 */
export function generateFramecode(convention: string, width: number): string {
  if (!WidthSchema.safeParse(width).success) {
    throw new InvalidWidthError(width);
  }
  if (!isConventionId(convention)) {
    throw new UnsupportedConventionError(convention);
  }

  const { generate } = getConvention(convention);
  if (!generate) {
    throw new UnsupportedGenerationError(convention);
  }
  return generate(width);
}

/**
 * A filename whose base name contains a framecode.
 *
 * Only the stem (base name without extension) is searched, so digits in
 * directory names are never mistaken for frame numbers.
 */
export class FramecodeParser {
  /** The filename this parser was created from. */
  readonly input: string;
  readonly parsed: ParsedFramecode;

  private readonly convention: FramecodeConvention;
  private readonly stem: string;

  constructor(filename: FilenameLike) {
    this.input = toFilename(filename);

    const base = path.basename(this.input);
    const extension = path.extname(base);
    const stem = base.slice(0, base.length - extension.length);

    const detection = detect(stem);
    if (!detection) {
      throw new NoFramecodeFoundError(this.input);
    }

    const { convention, match } = detection;
    const all = [...stem.matchAll(new RegExp(convention.pattern.source, 'g'))];
    const last = all[all.length - 1] ?? match;
    const lastEnd = (last.index ?? match.index) + last[0].length;

    this.convention = convention;
    this.stem = stem;
    this.parsed = {
      convention: convention.id,
      matchedText: match[0],
      matchStart: match.index,
      matchEnd: match.index + match[0].length,
      width: convention.widthOf(match[1] ?? match[0]),
      stemPrefix: stem.slice(0, match.index),
      stemSuffix: stem.slice(lastEnd),
      directory: path.dirname(this.input),
      extension,
    };

    log.debug({ input: this.input, convention: convention.id, width: this.parsed.width }, 'framecode detected');
  }

  get conventionId(): ConventionId {
    return this.convention.id;
  }

  /** The framecode text, e.g. '0001', '%04d' or '####'. */
  get framecode(): string {
    return this.parsed.matchedText;
  }

  get width(): number {
    return this.parsed.width;
  }

  /**
   * The literal frame number. Only raw digits carry one.
   * @throws UnsafeIntegerError for digit runs past the safe integer range.
   */
  get frameNumber(): number | undefined {
    return this.convention.id === 'digits' ? parseSafeInteger(this.framecode) : undefined;
  }

  /**
   * Replace the framecode with a string. The convention's own pattern is
   * re-applied to the stem and the replacement is inserted literally.
   */
  replace(replacement: string): string {
    const stem = this.stem.replace(this.convention.pattern, () => replacement);
    return joinPath(this.parsed.directory, stem + this.parsed.extension);
  }

  /**
   * Rewrite the framecode in another convention, keeping its width.
   * Translating to 'regex' is the same as createRegex(widthPolicy).
   */
  translate(target: TranslationTarget, widthPolicy: WidthPolicy = DEFAULT_WIDTH_POLICY): string {
    if (target === 'regex') {
      return this.createRegex(widthPolicy);
    }
    return this.replace(generateFramecode(target, this.width));
  }

  /**
   * Build a regex source matching every filename of this naming family:
   * same directory, same text around the framecode, same extension, and a
   * frame number whose width satisfies the policy.
   *
   * - any: frame numbers of any width
   * - min: the same width or wider
   * - max: the same width or narrower
   * - exact: the same width only
   */
  createRegex(widthPolicy: WidthPolicy = DEFAULT_WIDTH_POLICY): string {
    const policy = validatePolicy(widthPolicy);
    const { stemPrefix, stemSuffix, extension, directory } = this.parsed;

    const name =
      escapeRegex(stemPrefix) + widthFragment(policy, this.width) + escapeRegex(stemSuffix) + escapeRegex(extension);

    return escapeRegex(directoryPrefix(directory)) + name;
  }
}

/**
 * Parse a filename, or return undefined when it has no framecode.
 * Every other failure propagates.
 */
export function tryParse(filename: FilenameLike): FramecodeParser | undefined {
  try {
    return new FramecodeParser(filename);
  } catch (error) {
    if (error instanceof NoFramecodeFoundError) {
      log.debug({ input: error.input }, 'no framecode found');
      return undefined;
    }
    throw error;
  }
}

/** The framecode portion of a filename, e.g. '0042' in 'shot_0042.exr'. */
export function getFramecode(filename: FilenameLike): string | undefined {
  return tryParse(filename)?.framecode;
}

/**
 * The frame number of a filename. Placeholders such as '%04d' or '####'
 * have no frame number and yield undefined.
 */
export function getFrameNumber(filename: FilenameLike): number | undefined {
  return tryParse(filename)?.frameNumber;
}

export function hasFramecode(filename: FilenameLike): boolean {
  return tryParse(filename) !== undefined;
}

export function getFramecodeConvention(filename: FilenameLike): ConventionId | undefined {
  return tryParse(filename)?.conventionId;
}

export function getFramecodeWidth(filename: FilenameLike): number | undefined {
  return tryParse(filename)?.width;
}

/** Replace the framecode. A filename without one is returned unchanged. */
export function replaceFramecode(filename: FilenameLike, replacement: string): string {
  const parser = tryParse(filename);
  return parser ? parser.replace(replacement) : toFilename(filename);
}

/**
 * Translate the framecode to another convention. A filename without one is
 * returned unchanged.
 *
 * @example
 * ```ts
 * translateFramecode('renders/beauty.0101.exr', 'hash');
 * // 'renders/beauty.####.exr'
 * ```
 */
export function translateFramecode(
  filename: FilenameLike,
  target: TranslationTarget,
  widthPolicy: WidthPolicy = DEFAULT_WIDTH_POLICY,
): string {
  const parser = tryParse(filename);
  return parser ? parser.translate(target, widthPolicy) : toFilename(filename);
}

/**
 * Regex source matching filenames of the same naming family. A filename
 * without a framecode yields a regex matching that filename literally.
 */
export function createRegexFor(filename: FilenameLike, widthPolicy: WidthPolicy = DEFAULT_WIDTH_POLICY): string {
  validatePolicy(widthPolicy);
  const parser = tryParse(filename);
  return parser ? parser.createRegex(widthPolicy) : escapeRegex(toFilename(filename));
}
