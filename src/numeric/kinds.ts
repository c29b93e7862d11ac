/**
 * Fixed-width integer kinds and conversions into them.
 *
 * Every clamp value is carried as a `bigint`; the kind fixes the machine range
 * the value must be representable in.
 *
 * @module
 */

import { MachineOverflowError, ParseFailedError } from '../types/errors.js';

export const INTEGER_KIND_NAMES = [
  'u8',
  'u16',
  'u32',
  'u64',
  'u128',
  'usize',
  'i8',
  'i16',
  'i32',
  'i64',
  'i128',
  'isize',
] as const;

export type IntegerKindName = (typeof INTEGER_KIND_NAMES)[number];

/** Accepted input for integer entry points. */
export type IntegerLike = number | bigint;

export interface IntegerKind {
  readonly name: IntegerKindName;
  readonly bits: number;
  readonly signed: boolean;
  readonly min: bigint;
  readonly max: bigint;
}

function unsigned(name: IntegerKindName, bits: number): IntegerKind {
  return { name, bits, signed: false, min: 0n, max: (1n << BigInt(bits)) - 1n };
}

function signed(name: IntegerKindName, bits: number): IntegerKind {
  const half = 1n << BigInt(bits - 1);
  return { name, bits, signed: true, min: -half, max: half - 1n };
}

export const INTEGER_KINDS: Readonly<Record<IntegerKindName, IntegerKind>> = {
  u8: unsigned('u8', 8),
  u16: unsigned('u16', 16),
  u32: unsigned('u32', 32),
  u64: unsigned('u64', 64),
  u128: unsigned('u128', 128),
  usize: unsigned('usize', 64),
  i8: signed('i8', 8),
  i16: signed('i16', 16),
  i32: signed('i32', 32),
  i64: signed('i64', 64),
  i128: signed('i128', 128),
  isize: signed('isize', 64),
};

export function isIntegerKindName(value: unknown): value is IntegerKindName {
  return INTEGER_KIND_NAMES.some((name) => name === value);
}

export function resolveKind(kind: IntegerKind | IntegerKindName): IntegerKind {
  return typeof kind === 'string' ? INTEGER_KINDS[kind] : kind;
}

export function fitsKind(value: bigint, kind: IntegerKind): boolean {
  return value >= kind.min && value <= kind.max;
}

/**
 * Normalise an {@link IntegerLike} to a `bigint`. Non-integer numbers
 * (fractions, NaN, Infinity) are rejected.
 */
export function toBigInt(value: IntegerLike, kind: IntegerKind): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isInteger(value)) {
    throw new ParseFailedError(String(value), kind.name, 'not an integer');
  }
  return BigInt(value);
}

/** Normalise and require the value to be representable in `kind`. */
export function toKindValue(value: IntegerLike, kind: IntegerKind, operation = 'conversion'): bigint {
  const big = toBigInt(value, kind);
  if (!fitsKind(big, kind)) {
    throw new MachineOverflowError(operation, kind.name, `${big} does not fit in ${kind.name}`);
  }
  return big;
}

const INTEGER_TEXT = /^[+-]?[0-9]+$/;

/**
 * Parse the decimal text form of an integer of `kind`. Text that is not an
 * integer, or an integer outside the kind, is a {@link ParseFailedError}.
 */
export function parseInteger(text: string, kind: IntegerKind): bigint {
  if (text.length === 0) {
    throw new ParseFailedError(text, kind.name, 'cannot parse integer from empty string');
  }
  if (!INTEGER_TEXT.test(text)) {
    throw new ParseFailedError(text, kind.name, 'invalid digit found in string');
  }
  if (!kind.signed && text.startsWith('-')) {
    throw new ParseFailedError(text, kind.name, 'invalid digit found in string');
  }
  const value = BigInt(text);
  if (value > kind.max) {
    throw new ParseFailedError(text, kind.name, 'number too large to fit in target type');
  }
  if (value < kind.min) {
    throw new ParseFailedError(text, kind.name, 'number too small to fit in target type');
  }
  return value;
}
