import { describe, it, expect } from 'vitest';
import { Panicking, Saturating, behaviorFor, resolveWithin } from './behavior.js';
import { Limits } from './limits.js';
import { OutOfBoundsError } from '../types/errors.js';

const limits = Limits.of('i16', { lower: -10, upper: 10 });

describe('Panicking', () => {
  it('fails on both sides', () => {
    expect(() => Panicking.resolveOverflow(11n, limits)).toThrow(OutOfBoundsError);
    expect(() => Panicking.resolveUnderflow(-11n, limits)).toThrow('Value -11 is out of bounds [-10, 10]');
  });
});

describe('Saturating', () => {
  it('returns the violated bound', () => {
    expect(Saturating.resolveOverflow(500n, limits)).toBe(10n);
    expect(Saturating.resolveUnderflow(-500n, limits)).toBe(-10n);
  });
});

describe('behaviorFor', () => {
  it('maps kinds to policies', () => {
    expect(behaviorFor('panicking')).toBe(Panicking);
    expect(behaviorFor('saturating')).toBe(Saturating);
    expect(Saturating.kind).toBe('saturating');
  });
});

describe('resolveWithin', () => {
  it('passes in-range values through', () => {
    expect(resolveWithin(3n, limits, Panicking)).toBe(3n);
  });

  it('routes out-of-range values to the behavior', () => {
    expect(resolveWithin(12n, limits, Saturating)).toBe(10n);
    expect(resolveWithin(-12n, limits, Saturating)).toBe(-10n);
    expect(() => resolveWithin(12n, limits, Panicking)).toThrow(OutOfBoundsError);
  });
});
