/**
 * Immutable `[lower, upper]` range over an integer kind.
 *
 * @module
 */

import { ConfigurationInvalidError, OutOfBoundsError } from '../types/errors.js';
import { err, ok } from '../types/result.js';
import type { Result } from '../types/result.js';
import { fitsKind, resolveKind, toBigInt } from '../numeric/kinds.js';
import type { IntegerKind, IntegerKindName, IntegerLike } from '../numeric/kinds.js';

export interface LimitsInput {
  /** Inclusive lower bound. Defaults to the kind's minimum. */
  lower?: IntegerLike;
  /** Inclusive upper bound. Defaults to the kind's maximum. */
  upper?: IntegerLike;
}

export class Limits {
  readonly kind: IntegerKind;
  readonly lower: bigint;
  readonly upper: bigint;

  private constructor(kind: IntegerKind, lower: bigint, upper: bigint) {
    this.kind = kind;
    this.lower = lower;
    this.upper = upper;
    Object.freeze(this);
  }

  /**
   * Fix the limits for a kind. Bounds outside the kind, or `lower > upper`,
   * are rejected here rather than on first use.
   *
   * @example
   * ```typescript
   * const percent = Limits.of('u8', { upper: 100 }); // [0, 100]
   * ```
   */
  static of(kindInput: IntegerKind | IntegerKindName, bounds: LimitsInput = {}): Limits {
    const kind = resolveKind(kindInput);
    const lower = bounds.lower === undefined ? kind.min : Limits.bound(bounds.lower, kind, 'lower');
    const upper = bounds.upper === undefined ? kind.max : Limits.bound(bounds.upper, kind, 'upper');

    if (lower > upper) {
      throw new ConfigurationInvalidError(
        `lower bound ${lower} is greater than upper bound ${upper}`,
        lower,
        upper,
      );
    }
    return new Limits(kind, lower, upper);
  }

  private static bound(value: IntegerLike, kind: IntegerKind, label: string): bigint {
    if (typeof value === 'number' && !Number.isInteger(value)) {
      throw new ConfigurationInvalidError(`${label} bound ${value} is not an integer`);
    }
    const big = toBigInt(value, kind);
    if (!fitsKind(big, kind)) {
      throw new ConfigurationInvalidError(
        `${label} bound ${big} is outside the ${kind.name} range [${kind.min}, ${kind.max}]`,
      );
    }
    return big;
  }

  contains(value: bigint): boolean {
    return value >= this.lower && value <= this.upper;
  }

  check(value: bigint): Result<bigint, OutOfBoundsError> {
    return this.contains(value) ? ok(value) : err(new OutOfBoundsError(value, this.lower, this.upper));
  }

  /** Return `value` when in range, otherwise throw {@link OutOfBoundsError}. */
  validate(value: bigint): bigint {
    if (!this.contains(value)) {
      throw new OutOfBoundsError(value, this.lower, this.upper);
    }
    return value;
  }

  saturate(value: bigint): bigint {
    if (value < this.lower) return this.lower;
    if (value > this.upper) return this.upper;
    return value;
  }

  /** Zero when zero lies in range, otherwise `lower`. */
  get defaultValue(): bigint {
    return this.contains(0n) ? 0n : this.lower;
  }

  equals(other: Limits): boolean {
    return this.kind.name === other.kind.name && this.lower === other.lower && this.upper === other.upper;
  }

  toString(): string {
    return `${this.kind.name}[${this.lower}, ${this.upper}]`;
  }
}
