import { describe, it, expect } from 'vitest';
import { CONVENTIONS, detect, getConvention, isConventionId } from '../src/conventions';
import { UnsupportedConventionError } from '../src/errors';
import type { ConventionId } from '../src/types';

describe('conventions', () => {
  it('lists conventions in detection priority order', () => {
    expect(CONVENTIONS.map(c => c.id)).toEqual(['format_code', 'modulo', 'hash', 'digits']);
  });

  it('detects the highest priority convention', () => {
    const detection = detect('a%04d_####');
    expect(detection?.convention.id).toBe('modulo');
    expect(detection?.match[0]).toBe('%04d');
  });

  it('returns undefined for a stem without a framecode', () => {
    expect(detect('frame')).toBeUndefined();
  });

  it('computes widths per convention', () => {
    expect(getConvention('format_code').widthOf('08')).toBe(8);
    expect(getConvention('hash').widthOf('###')).toBe(3);
    expect(getConvention('digits').widthOf('-012')).toBe(4);
  });

  it('has no generator for raw digits', () => {
    expect(getConvention('digits').generate).toBeUndefined();
    expect(getConvention('modulo').generate?.(2)).toBe('%02d');
  });

  it('narrows convention ids', () => {
    expect(isConventionId('hash')).toBe(true);
    expect(isConventionId('numbersign')).toBe(false);
    expect(isConventionId(4)).toBe(false);
  });

  it('throws UnsupportedConventionError for an unknown id', () => {
    expect(() => getConvention('numbersign' as ConventionId)).toThrow(UnsupportedConventionError);
  });
});
