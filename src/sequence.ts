/**
 * framecode — Frame Sequences
 *
 * In-memory collections of frames sharing a Seqname. Callers supply the
 * candidate paths (from a directory listing, a manifest, a render log);
 * nothing here touches the file system.
 */

import path from 'node:path';
import { FrameNumberSchema } from './config';
import { EmptyInputError, InvalidStepError, SequenceMismatchError, TypeMismatchError } from './errors';
import { createLogger } from './logger';
import { formatNumbers, parseNumbers, steppedRange } from './numbers';
import { getFrameNumber, joinPath, toFilename } from './parser';
import { Seqname } from './seqname';
import type { FilenameLike } from './types';

const log = createLogger('sequence');

export interface FrameLookupOptions {
  /**
   * When true (default) numbers are frame numbers taken from filenames;
   * when false they are indices into the sorted sequence.
   */
  absolute?: boolean;
}

export interface FrameRangeOptions extends FrameLookupOptions {
  /** First frame; defaults to the start of the sequence in the step's direction. */
  start?: number;
  /** Last frame, inclusive; defaults to the end of the sequence in the step's direction. */
  end?: number;
  step?: number;
  /**
   * Explicit frame numbers, as integers or a range string like '1-10x2'.
   * Overrides start, end and step.
   */
  frameRange?: Iterable<number> | string;
}

interface FrameEntry {
  path: string;
  frameNumber: number;
}

/** Same path normalization as the parser applies when it rebuilds a name. */
function normalizeFrame(frame: FilenameLike): string {
  const filename = toFilename(frame);
  return joinPath(path.dirname(filename), path.basename(filename));
}

function requireInteger(value: number, what: string): number {
  if (!FrameNumberSchema.safeParse(value).success) {
    throw new TypeMismatchError(`${what} must be a safe integer, got ${String(value)}`);
  }
  return value;
}

function explicitRange(frameRange: Iterable<number> | string): Iterable<number> {
  return typeof frameRange === 'string' ? parseNumbers(frameRange) : frameRange;
}

/**
 * Frames that share one naming family, sorted by frame number.
 *
 * ```ts
 * const seq = new FrameSequence(['bg_0001.exr', 'bg_0002.exr', 'bg_0004.exr']);
 * seq.toString();    // 'bg_####.exr 1-4 (1, 2, 4)'
 * seq.getFrame(2);   // 'bg_0002.exr'
 * seq.getFrame(3);   // undefined
 * ```
 */
export class FrameSequence implements Iterable<string> {
  readonly name: Seqname;

  private readonly entries: readonly FrameEntry[];
  private readonly lookup: ReadonlySet<string>;

  /**
   * @throws EmptyInputError when no frames are given.
   * @throws SequenceMismatchError when a frame has no frame number or
   *   belongs to another naming family.
   */
  constructor(frames: Iterable<FilenameLike>) {
    const unique = new Set<string>();
    for (const frame of frames) {
      unique.add(normalizeFrame(frame));
    }
    if (unique.size === 0) {
      throw new EmptyInputError('Frame sequence');
    }

    const entries = [...unique]
      .map(frame => {
        const frameNumber = getFrameNumber(frame);
        if (frameNumber === undefined) {
          throw new SequenceMismatchError(frame, 'has no frame number');
        }
        return { path: frame, frameNumber };
      })
      .sort((a, b) => a.frameNumber - b.frameNumber);

    const name = new Seqname(entries[0].path);
    for (const entry of entries) {
      if (!name.matches(entry.path)) {
        throw new SequenceMismatchError(entry.path, `does not match '${name.toString()}'`);
      }
    }

    this.name = name;
    this.entries = entries;
    this.lookup = unique;
  }

  /** Paths of all frames, sorted by frame number. */
  get frames(): string[] {
    return this.entries.map(entry => entry.path);
  }

  get frameNumbers(): number[] {
    return this.entries.map(entry => entry.frameNumber);
  }

  get start(): number {
    return this.entries[0].frameNumber;
  }

  get end(): number {
    return this.entries[this.entries.length - 1].frameNumber;
  }

  /** First and last frame numbers. */
  get range(): [number, number] {
    return [this.start, this.end];
  }

  get length(): number {
    return this.entries.length;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.frames[Symbol.iterator]();
  }

  /** The frame at an index; negative indices count from the end. */
  at(index: number): string | undefined {
    return this.entries.at(index)?.path;
  }

  has(frame: FilenameLike): boolean {
    return this.lookup.has(normalizeFrame(frame));
  }

  /** Index of a frame in the sorted sequence, or -1. */
  indexOf(frame: FilenameLike): number {
    const target = normalizeFrame(frame);
    return this.entries.findIndex(entry => entry.path === target);
  }

  /** Whether both hold exactly the same frames. */
  equals(other: Iterable<FilenameLike>): boolean {
    const frames = new Set<string>();
    for (const frame of other) {
      frames.add(normalizeFrame(frame));
    }
    return frames.size === this.lookup.size && [...frames].every(frame => this.lookup.has(frame));
  }

  /**
   * The frame with frame number n, or at index n when not absolute.
   * Undefined when the sequence has no such frame.
   */
  getFrame(n: number, options: FrameLookupOptions = {}): string | undefined {
    requireInteger(n, 'Frame number');
    const { absolute = true } = options;

    if (!absolute) {
      return this.at(n);
    }
    const frame = this.name.format(n);
    return this.lookup.has(frame) ? frame : undefined;
  }

  /**
   * Yield the frame (or undefined where it is missing) for each requested
   * frame number.
   */
  *getFrames(options: FrameRangeOptions = {}): Generator<string | undefined, void, undefined> {
    const { absolute = true } = options;
    for (const n of this.resolveNumbers(options)) {
      yield this.getFrame(n, { absolute });
    }
  }

  private resolveNumbers(options: FrameRangeOptions): Iterable<number> {
    const { absolute = true, frameRange } = options;
    if (frameRange !== undefined) {
      return explicitRange(frameRange);
    }

    const step = requireInteger(options.step ?? 1, 'Step');
    if (step === 0) {
      throw new InvalidStepError(step);
    }
    const first = absolute ? this.start : 0;
    const last = absolute ? this.end : this.length - 1;

    const start = requireInteger(options.start ?? (step > 0 ? first : last), 'Start');
    const end = requireInteger(options.end ?? (step > 0 ? last : first), 'End');
    return steppedRange(start, step > 0 ? end + 1 : end - 1, step);
  }

  /**
   * Hash name and frame range, e.g. 'bg_####.exr 1-10'. When frames are
   * missing the precise range follows: 'bg_####.exr 1-10 (1-5, 7-10)'.
   */
  toString(): string {
    const broad = `${this.start}-${this.end}`;
    const precise = formatNumbers(this.frameNumbers);
    return precise === broad ? `${this.name.hash} ${broad}` : `${this.name.hash} ${broad} (${precise})`;
  }
}

/**
 * Collect the candidates belonging to the sequence named by a frame or a
 * placeholder name such as 'shots/sh010/plate.%04d.dpx'.
 */
export function findSequence(template: FilenameLike, candidates: Iterable<FilenameLike>): FrameSequence {
  const name = new Seqname(template);
  const frames: string[] = [];
  for (const candidate of candidates) {
    const frame = normalizeFrame(candidate);
    if (getFrameNumber(frame) !== undefined && name.matches(frame)) {
      frames.push(frame);
    }
  }
  log.debug({ template: name.toString(), frames: frames.length }, 'sequence found');
  return new FrameSequence(frames);
}

/**
 * Split candidates into sequences, one per naming family, in order of
 * first appearance. Candidates without a literal frame number are skipped.
 */
export function groupSequences(candidates: Iterable<FilenameLike>): FrameSequence[] {
  const groups: { name: Seqname; frames: string[] }[] = [];

  for (const candidate of candidates) {
    const frame = normalizeFrame(candidate);
    if (getFrameNumber(frame) === undefined) {
      log.debug({ frame }, 'skipped, no frame number');
      continue;
    }

    const group = groups.find(g => g.name.matches(frame));
    if (group) {
      group.frames.push(frame);
    } else {
      groups.push({ name: new Seqname(frame), frames: [frame] });
    }
  }

  return groups.map(group => new FrameSequence(group.frames));
}

/**
 * Walk several sequences in lockstep. Each row holds the n-th frame of
 * every sequence, or undefined where a sequence lacks it. Default bounds
 * span all sequences.
 *
 * ```ts
 * for (const [plate, matte] of zipSequences([plates, mattes])) { ... }
 * ```
 */
export function* zipSequences(
  sequences: readonly FrameSequence[],
  options: FrameRangeOptions = {},
): Generator<(string | undefined)[], void, undefined> {
  if (sequences.length === 0) {
    throw new EmptyInputError('Sequences');
  }

  const { absolute = true } = options;
  const step = options.step ?? 1;
  const first = absolute ? Math.min(...sequences.map(seq => seq.start)) : 0;
  const last = absolute ? Math.max(...sequences.map(seq => seq.end)) : Math.max(...sequences.map(seq => seq.length)) - 1;

  // a one-shot iterator must serve every sequence
  const frameRange = options.frameRange === undefined ? undefined : [...explicitRange(options.frameRange)];

  const shared: FrameRangeOptions = {
    absolute,
    step,
    start: options.start ?? (step >= 0 ? first : last),
    end: options.end ?? (step >= 0 ? last : first),
    frameRange,
  };
  const iterators = sequences.map(seq => seq.getFrames(shared));

  for (;;) {
    const row: (string | undefined)[] = [];
    for (const iterator of iterators) {
      const item = iterator.next();
      if (item.done) return;
      row.push(item.value);
    }
    yield row;
  }
}
