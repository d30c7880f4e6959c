/**
 * framecode — Errors
 *
 * Every error thrown by this package extends FramecodeError, so callers
 * can catch the whole family or a single kind.
 */

export class FramecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FramecodeError';
  }
}

/** The base name of the input contains no recognizable framecode. */
export class NoFramecodeFoundError extends FramecodeError {
  constructor(public readonly input: string) {
    super(`No framecode found in '${input}'`);
    this.name = 'NoFramecodeFoundError';
  }
}

export class UnsupportedConventionError extends FramecodeError {
  constructor(
    public readonly convention: string,
    message = `'${convention}' is not a supported framecode convention`,
  ) {
    super(message);
    this.name = 'UnsupportedConventionError';
  }
}

/** The convention exists but no placeholder can be generated for it. */
export class UnsupportedGenerationError extends UnsupportedConventionError {
  constructor(convention: string) {
    super(convention, `Cannot generate framecode of convention '${convention}'`);
    this.name = 'UnsupportedGenerationError';
  }
}

export class InvalidWidthPolicyError extends FramecodeError {
  constructor(public readonly policy: unknown) {
    super(`'${String(policy)}' is not a supported width policy. Available policies: 'any', 'min', 'max', 'exact'`);
    this.name = 'InvalidWidthPolicyError';
  }
}

export class InvalidWidthError extends FramecodeError {
  constructor(public readonly width: unknown) {
    super(`Width must be a positive integer, got ${String(width)}`);
    this.name = 'InvalidWidthError';
  }
}

export class TypeMismatchError extends FramecodeError {
  constructor(message: string) {
    super(message);
    this.name = 'TypeMismatchError';
  }
}

export class NotIterableError extends FramecodeError {
  constructor() {
    super('Numbers must be an iterable of integers');
    this.name = 'NotIterableError';
  }
}

export class NonIntegerElementError extends FramecodeError {
  constructor(
    public readonly element: unknown,
    public readonly index: number,
  ) {
    super(`Numbers must only contain integers, found ${String(element)} at index ${index}`);
    this.name = 'NonIntegerElementError';
  }
}

/** A number that a JavaScript number cannot hold exactly. */
export class UnsafeIntegerError extends FramecodeError {
  constructor(public readonly value: string | number) {
    super(`${String(value)} is outside the safe integer range`);
    this.name = 'UnsafeIntegerError';
  }
}

export class EmptyInputError extends FramecodeError {
  constructor(what = 'Input') {
    super(`${what} is empty`);
    this.name = 'EmptyInputError';
  }
}

export class InvalidStepError extends FramecodeError {
  constructor(public readonly step: number) {
    super(`Step must not be ${step}`);
    this.name = 'InvalidStepError';
  }
}

/** A frame does not belong to the sequence it was added to. */
export class SequenceMismatchError extends FramecodeError {
  constructor(
    public readonly frame: string,
    reason: string,
  ) {
    super(`Frame '${frame}' ${reason}`);
    this.name = 'SequenceMismatchError';
  }
}
