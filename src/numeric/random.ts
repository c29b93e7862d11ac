/**
 * Uniform random integers over arbitrary `bigint` ranges.
 *
 * @module
 */

import type { RandomSource } from '../config.js';
import { getRandomSource } from '../config.js';

function bitLength(value: bigint): number {
  return value === 0n ? 0 : value.toString(2).length;
}

function bytesToBigInt(bytes: Uint8Array): bigint {
  let out = 0n;
  for (const byte of bytes) {
    out = (out << 8n) | BigInt(byte);
  }
  return out;
}

/**
 * Draw a uniformly distributed integer in `[lower, upper]`.
 *
 * Samples `bitLength(span)` bits and rejects draws past the span, so every
 * value in range is equally likely.
 */
export function randomInRange(
  lower: bigint,
  upper: bigint,
  source: RandomSource = getRandomSource(),
): bigint {
  const span = upper - lower;
  if (span === 0n) return lower;

  const bits = bitLength(span);
  const byteCount = Math.ceil(bits / 8);
  const mask = (1n << BigInt(bits)) - 1n;

  for (;;) {
    const bytes = source(byteCount);
    if (bytes.length !== byteCount) {
      throw new RangeError(`Random source returned ${bytes.length} bytes, expected ${byteCount}`);
    }
    const candidate = bytesToBigInt(bytes) & mask;
    if (candidate <= span) {
      return lower + candidate;
    }
  }
}
