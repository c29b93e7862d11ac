/**
 * Raw-value serialization.
 *
 * Clamps serialize to their raw integer only. Integers that fit a JSON number
 * exactly are emitted as numbers, larger ones as decimal strings; decoding
 * takes either form (or a `bigint`).
 *
 * @module
 */

import { z } from 'zod';
import { fitsKind, parseInteger } from '../numeric/kinds.js';
import type { IntegerKind } from '../numeric/kinds.js';
import { ParseFailedError } from '../types/errors.js';

export type RawJson = number | string;

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

const rawNumberSchema = z.union([z.bigint(), z.number().int()]);

function describe(raw: unknown): string {
  if (raw === undefined) return 'undefined';
  try {
    return JSON.stringify(raw) ?? String(raw);
  } catch {
    return String(raw);
  }
}

export function encodeRaw(value: bigint): RawJson {
  return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value.toString();
}

/**
 * Decode a raw value into an integer of `kind`. Anything that is not an
 * integer of the kind is a {@link ParseFailedError}; limits are not checked.
 */
export function decodeRaw(raw: unknown, kind: IntegerKind): bigint {
  if (typeof raw === 'string') {
    return parseInteger(raw, kind);
  }
  const parsed = rawNumberSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseFailedError(describe(raw), kind.name, 'expected an integer');
  }
  const value = BigInt(parsed.data);
  if (!fitsKind(value, kind)) {
    throw new ParseFailedError(String(value), kind.name, `value does not fit in ${kind.name}`);
  }
  return value;
}

/** Schema for a view item: any zod schema producing `T`. */
export type ItemSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Decode an arbitrary item against a zod schema. Only the shape is checked;
 * validators run separately.
 */
export function decodeItem<T>(raw: unknown, schema: ItemSchema<T>): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'item'}: ${issue.message}`)
      .join('; ');
    throw new ParseFailedError(describe(raw), 'item', details);
  }
  return parsed.data;
}
