import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { decodeItem, decodeRaw, encodeRaw } from './codec.js';
import { INTEGER_KINDS } from '../numeric/kinds.js';
import { ParseFailedError } from '../types/errors.js';

describe('encodeRaw', () => {
  it('emits safe integers as numbers', () => {
    expect(encodeRaw(42n)).toBe(42);
    expect(encodeRaw(-7n)).toBe(-7);
    expect(encodeRaw(9007199254740991n)).toBe(9007199254740991);
  });

  it('emits larger integers as decimal strings', () => {
    expect(encodeRaw(9007199254740992n)).toBe('9007199254740992');
    expect(encodeRaw(-(2n ** 127n))).toBe('-170141183460469231731687303715884105728');
  });
});

describe('decodeRaw', () => {
  it('accepts numbers, bigints and decimal strings', () => {
    expect(decodeRaw(42, INTEGER_KINDS.u8)).toBe(42n);
    expect(decodeRaw(42n, INTEGER_KINDS.u8)).toBe(42n);
    expect(decodeRaw('18446744073709551615', INTEGER_KINDS.u64)).toBe(2n ** 64n - 1n);
  });

  it('rejects non-integers', () => {
    expect(() => decodeRaw(1.5, INTEGER_KINDS.u8)).toThrow('Cannot parse "1.5" as u8: expected an integer');
    expect(() => decodeRaw(null, INTEGER_KINDS.u8)).toThrow('Cannot parse "null" as u8: expected an integer');
    expect(() => decodeRaw(undefined, INTEGER_KINDS.u8)).toThrow(ParseFailedError);
    expect(() => decodeRaw('4x', INTEGER_KINDS.u8)).toThrow('invalid digit found in string');
  });

  it('rejects values outside the kind', () => {
    expect(() => decodeRaw(300, INTEGER_KINDS.u8)).toThrow('Cannot parse "300" as u8: value does not fit in u8');
  });
});

describe('decodeItem', () => {
  const schema = z.object({ name: z.string(), count: z.number() });

  it('returns the parsed item', () => {
    expect(decodeItem({ name: 'a', count: 1 }, schema)).toEqual({ name: 'a', count: 1 });
  });

  it('reports shape mismatches', () => {
    expect(() => decodeItem({ name: 'a' }, schema)).toThrow(
      'Cannot parse "{"name":"a"}" as item: count: Required',
    );
  });
});
