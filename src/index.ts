/**
 * framecode
 *
 * Parse, generate and match frame sequence filenames such as
 * `frame0001.png`, `frame%04d.png`, `frame####.png` and `frame{:04d}.png`,
 * and convert frame ranges to and from strings like "1-5, 10-16x2".
 */

import { Seqname } from './seqname';
import type { FilenameLike } from './types';

export type {
  ConventionId,
  FilenameLike,
  FramecodeConvention,
  ParsedFramecode,
  RangeRun,
  TranslationTarget,
  WidthPolicy,
} from './types';

export { CONVENTIONS, detect, getConvention, isConventionId } from './conventions';
export type { Detection } from './conventions';
export {
  FramecodeParser,
  createRegexFor,
  escapeRegex,
  generateFramecode,
  getFramecode,
  getFramecodeConvention,
  getFramecodeWidth,
  getFrameNumber,
  hasFramecode,
  replaceFramecode,
  translateFramecode,
  tryParse,
  widthFragment,
} from './parser';
export { Seqname, padFrameNumber } from './seqname';
export { formatNumbers, parseNumbers } from './numbers';
export { FrameSequence, findSequence, groupSequences, zipSequences } from './sequence';
export type { FrameLookupOptions, FrameRangeOptions } from './sequence';
export {
  FramecodeError,
  NoFramecodeFoundError,
  UnsupportedConventionError,
  UnsupportedGenerationError,
  InvalidWidthPolicyError,
  InvalidWidthError,
  TypeMismatchError,
  NotIterableError,
  NonIntegerElementError,
  UnsafeIntegerError,
  EmptyInputError,
  InvalidStepError,
  SequenceMismatchError,
} from './errors';
export { DEFAULT_STRICT_MATCH, DEFAULT_WIDTH_POLICY, loadLogConfig } from './config';
export type { LogConfig, LogLevel } from './config';
export { createLogger, createRootLogger } from './logger';

/**
 * Build the Seqname of a frame or placeholder name in one step.
 *
 * @example
 * ```ts
 * import { seqname } from 'framecode';
 *
 * seqname('comp/sh010_v003.1001.exr').modulo;
 * // 'comp/sh010_v003.%04d.exr'
 * ```
 */
export function seqname(filename: FilenameLike): Seqname {
  return new Seqname(filename);
}
