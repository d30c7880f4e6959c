/**
 * framecode — Seqname
 *
 * A formattable name shared by every file of a frame sequence.
 */

import { DEFAULT_STRICT_MATCH, FrameNumberSchema } from './config';
import { TypeMismatchError } from './errors';
import { FramecodeParser, toFilename, tryParse } from './parser';
import type { FilenameLike } from './types';

/**
 * Zero-fill a frame number to a width. A negative number spends one
 * character of the width on its sign: `padFrameNumber(-4, 4)` is '-004'.
 */
export function padFrameNumber(frameNumber: number, width: number): string {
  if (frameNumber < 0) {
    return '-' + String(-frameNumber).padStart(width - 1, '0');
  }
  return String(frameNumber).padStart(width, '0');
}

/**
 * The name of a frame sequence, built from any of its frames or from a
 * placeholder name. Its canonical form uses a format code:
 *
 * ```ts
 * const name = new Seqname('plates/bg_0042.exr');
 * name.toString();        // 'plates/bg_{:04d}.exr'
 * name.hash;              // 'plates/bg_####.exr'
 * name.format(7);         // 'plates/bg_0007.exr'
 * name.matches('plates/bg_1001.exr');  // true
 * ```
 */
export class Seqname {
  /** Canonical form, e.g. 'frame{:04d}.png'. */
  readonly value: string;

  private readonly parser: FramecodeParser;

  /** @throws NoFramecodeFoundError when the name has no framecode. */
  constructor(filename: FilenameLike) {
    this.parser = new FramecodeParser(filename);
    this.value = this.parser.translate('format_code');
  }

  get formatCode(): string {
    return this.value;
  }

  /** e.g. 'frame%04d.png' */
  get modulo(): string {
    return this.parser.translate('modulo');
  }

  /** e.g. 'frame####.png' */
  get hash(): string {
    return this.parser.translate('hash');
  }

  /** Regex source matching frames of this sequence at any width. */
  get regex(): string {
    return this.parser.createRegex();
  }

  get width(): number {
    return this.parser.width;
  }

  /** The name of one frame. */
  format(frameNumber: number): string {
    if (!FrameNumberSchema.safeParse(frameNumber).success) {
      throw new TypeMismatchError(`Frame number must be a safe integer, got ${String(frameNumber)}`);
    }
    return this.parser.replace(padFrameNumber(frameNumber, this.width));
  }

  /**
   * Whether a filename belongs to this sequence.
   *
   * A frame matches through the regex: in full when strict, anywhere in the
   * candidate otherwise. A placeholder name matches when it describes the
   * same sequence, e.g. 'frame%04d.png' matches 'frame####.png'.
   */
  matches(candidate: FilenameLike, strict: boolean = DEFAULT_STRICT_MATCH): boolean {
    const filename = toFilename(candidate);
    const pattern = strict ? new RegExp(`^(?:${this.regex})$`) : new RegExp(this.regex);
    if (pattern.test(filename)) {
      return true;
    }

    const other = tryParse(filename);
    return other !== undefined && other.translate('format_code') === this.value;
  }

  equals(other: Seqname | string): boolean {
    return this.value === (typeof other === 'string' ? other : other.value);
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
