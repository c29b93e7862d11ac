/**
 * HardClamp - an integer that is always inside its limits.
 *
 * Outside an open guard the value satisfies the definition's limits at every
 * observable point. Construction validates, arithmetic resolves through the
 * definition's behavior, and guard commits reject out-of-range values.
 *
 * @module
 */

import type { BehaviorKind } from '../bounds/behavior.js';
import { getLogger } from '../config.js';
import { parseInteger, toBigInt } from '../numeric/kinds.js';
import type { IntegerLike } from '../numeric/kinds.js';
import { randomInRange } from '../numeric/random.js';
import type { RandomSource } from '../config.js';
import { decodeRaw } from '../serde/codec.js';
import type { OutOfBoundsError } from '../types/errors.js';
import { err, ok } from '../types/result.js';
import type { Result } from '../types/result.js';
import { ClampBase } from './base.js';
import type { ClampDefinition } from './definition.js';

export class HardClamp<K extends BehaviorKind = BehaviorKind> extends ClampBase<K, HardClamp<K>> {
  private constructor(definition: ClampDefinition<K>, value: bigint) {
    super(definition, value);
  }

  /**
   * Check `value` against the definition without constructing a clamp.
   */
  static validate(definition: ClampDefinition, value: IntegerLike): Result<bigint, OutOfBoundsError> {
    return definition.limits.check(toBigInt(value, definition.kind));
  }

  /**
   * Construct a clamp, or fail with {@link OutOfBoundsError}. There is no
   * silent clamping on construction.
   *
   * @example
   * ```typescript
   * const level = HardClamp.create(Level, 5);
   * level.addAssign(5);
   * ```
   */
  static create<K extends BehaviorKind>(definition: ClampDefinition<K>, value: IntegerLike): HardClamp<K> {
    const result = HardClamp.tryCreate(definition, value);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  static tryCreate<K extends BehaviorKind>(
    definition: ClampDefinition<K>,
    value: IntegerLike,
  ): Result<HardClamp<K>, OutOfBoundsError> {
    const checked = HardClamp.validate(definition, value);
    if (!checked.ok) {
      return err(checked.error);
    }
    return ok(new HardClamp(definition, checked.value));
  }

  /** Construct from any integer, clamping it into range. */
  static saturate(definition: ClampDefinition<'saturating'>, value: IntegerLike): HardClamp<'saturating'> {
    return new HardClamp(definition, definition.limits.saturate(toBigInt(value, definition.kind)));
  }

  /** Uniform sample over `[lower, upper]`. */
  static random<K extends BehaviorKind>(definition: ClampDefinition<K>, source?: RandomSource): HardClamp<K> {
    return new HardClamp(definition, randomInRange(definition.lower, definition.upper, source));
  }

  static defaultFor<K extends BehaviorKind>(definition: ClampDefinition<K>): HardClamp<K> {
    return new HardClamp(definition, definition.defaultValue);
  }

  /**
   * Parse decimal text. Malformed text fails with `ParseFailedError`, an
   * in-kind value outside the limits with `OutOfBoundsError`.
   */
  static parse<K extends BehaviorKind>(definition: ClampDefinition<K>, text: string): HardClamp<K> {
    return HardClamp.create(definition, parseInteger(text, definition.kind));
  }

  /**
   * Decode a serialized raw value. Out-of-range values are rejected, never
   * clamped.
   */
  static fromJSON<K extends BehaviorKind>(definition: ClampDefinition<K>, raw: unknown): HardClamp<K> {
    const result = HardClamp.tryCreate(definition, decodeRaw(raw, definition.kind));
    if (!result.ok) {
      getLogger().debug(`Rejected decoded value for ${definition.name}: ${result.error.message}`);
      throw result.error;
    }
    return result.value;
  }

  protected withRaw(value: bigint): HardClamp<K> {
    return new HardClamp(this.definition, value);
  }

  protected validateStaged(staged: bigint): Result<bigint, OutOfBoundsError> {
    return this.definition.limits.check(staged);
  }
}
