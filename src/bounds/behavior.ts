/**
 * Overflow/underflow policies.
 *
 * A behavior decides what becomes of an arithmetic result that left the
 * declared limits: `Panicking` fails the operation, `Saturating` replaces the
 * result with the violated bound.
 *
 * @module
 */

import { OutOfBoundsError } from '../types/errors.js';
import type { Limits } from './limits.js';

export type BehaviorKind = 'panicking' | 'saturating';

export interface Behavior<K extends BehaviorKind = BehaviorKind> {
  readonly kind: K;
  /** Resolve a raw result above `limits.upper`. */
  resolveOverflow(raw: bigint, limits: Limits): bigint;
  /** Resolve a raw result below `limits.lower`. */
  resolveUnderflow(raw: bigint, limits: Limits): bigint;
}

/** Always fails: the operation does not produce a value. */
export const Panicking: Behavior<'panicking'> = Object.freeze({
  kind: 'panicking',
  resolveOverflow(raw: bigint, limits: Limits): bigint {
    throw new OutOfBoundsError(raw, limits.lower, limits.upper);
  },
  resolveUnderflow(raw: bigint, limits: Limits): bigint {
    throw new OutOfBoundsError(raw, limits.lower, limits.upper);
  },
});

/** Never fails: yields the violated bound. */
export const Saturating: Behavior<'saturating'> = Object.freeze({
  kind: 'saturating',
  resolveOverflow(_raw: bigint, limits: Limits): bigint {
    return limits.upper;
  },
  resolveUnderflow(_raw: bigint, limits: Limits): bigint {
    return limits.lower;
  },
});

export function behaviorFor(kind: 'panicking'): Behavior<'panicking'>;
export function behaviorFor(kind: 'saturating'): Behavior<'saturating'>;
export function behaviorFor(kind: BehaviorKind): Behavior;
export function behaviorFor(kind: BehaviorKind): Behavior {
  return kind === 'saturating' ? Saturating : Panicking;
}

/**
 * Route a raw result through `behavior` when it falls outside `limits`.
 * In-range results pass through unchanged.
 */
export function resolveWithin(raw: bigint, limits: Limits, behavior: Behavior): bigint {
  if (raw > limits.upper) return behavior.resolveOverflow(raw, limits);
  if (raw < limits.lower) return behavior.resolveUnderflow(raw, limits);
  return raw;
}
