/**
 * SoftClamp - an integer that carries limits without being bound by them.
 *
 * The raw value only has to fit the machine kind. `set` and the operators
 * resolve through the behavior; `setUnchecked`, `update` and
 * `applyUnchecked` store whatever they are given.
 *
 * @module
 */

import { resolveWithin } from '../bounds/behavior.js';
import type { BehaviorKind } from '../bounds/behavior.js';
import type { RandomSource } from '../config.js';
import { parseInteger, toBigInt, toKindValue } from '../numeric/kinds.js';
import type { IntegerLike } from '../numeric/kinds.js';
import { randomInRange } from '../numeric/random.js';
import { decodeRaw } from '../serde/codec.js';
import type { OutOfBoundsError } from '../types/errors.js';
import { ok } from '../types/result.js';
import type { Result } from '../types/result.js';
import { computeBinary, computeUnary } from './arithmetic.js';
import type { BinaryOperation, UnaryOperation } from './arithmetic.js';
import { ClampBase } from './base.js';
import type { ClampDefinition } from './definition.js';

export class SoftClamp<K extends BehaviorKind = BehaviorKind> extends ClampBase<K, SoftClamp<K>> {
  private constructor(definition: ClampDefinition<K>, value: bigint) {
    super(definition, value);
  }

  /**
   * Check `value` against the limits without constructing a clamp. Values
   * outside the kind are reported as out of bounds, as `HardClamp.validate` does.
   */
  static validate(definition: ClampDefinition, value: IntegerLike): Result<bigint, OutOfBoundsError> {
    return definition.limits.check(toBigInt(value, definition.kind));
  }

  /**
   * Construct a clamp holding `value` verbatim, in range or not. Only values
   * that do not fit the kind are rejected (`MachineOverflowError`).
   */
  static create<K extends BehaviorKind>(definition: ClampDefinition<K>, value: IntegerLike): SoftClamp<K> {
    return new SoftClamp(definition, toKindValue(value, definition.kind, 'construction'));
  }

  static random<K extends BehaviorKind>(definition: ClampDefinition<K>, source?: RandomSource): SoftClamp<K> {
    return new SoftClamp(definition, randomInRange(definition.lower, definition.upper, source));
  }

  static defaultFor<K extends BehaviorKind>(definition: ClampDefinition<K>): SoftClamp<K> {
    return new SoftClamp(definition, definition.defaultValue);
  }

  /** Parse decimal text. Any integer of the kind is accepted. */
  static parse<K extends BehaviorKind>(definition: ClampDefinition<K>, text: string): SoftClamp<K> {
    return new SoftClamp(definition, parseInteger(text, definition.kind));
  }

  /** Decode a serialized raw value. Out-of-range values are kept as-is. */
  static fromJSON<K extends BehaviorKind>(definition: ClampDefinition<K>, raw: unknown): SoftClamp<K> {
    return new SoftClamp(definition, decodeRaw(raw, definition.kind));
  }

  /** Recomputed on every call. */
  isValid(): boolean {
    return this.definition.limits.contains(this.get());
  }

  /** The current value, or an error if it is out of range. */
  tryGet(): Result<bigint, OutOfBoundsError> {
    return this.definition.limits.check(this.get());
  }

  /**
   * Store `value`, resolving it through the behavior when out of range:
   * saturating clamps it, panicking throws and leaves the value unchanged.
   */
  set(value: IntegerLike): this {
    this.requireFree();
    const next = toKindValue(value, this.definition.kind, 'set');
    this.raw = resolveWithin(next, this.definition.limits, this.definition.behavior);
    return this;
  }

  /** Store `value` verbatim. */
  setUnchecked(value: IntegerLike): this {
    this.requireFree();
    this.raw = toKindValue(value, this.definition.kind, 'set');
    return this;
  }

  /** Replace the value with `fn(value)`, stored verbatim. */
  update(fn: (value: bigint) => IntegerLike): this {
    return this.setUnchecked(fn(this.get()));
  }

  /**
   * Apply an operator without behavior resolution. The result may leave the
   * limits but must still fit the kind.
   */
  applyUnchecked(op: UnaryOperation): this;
  applyUnchecked(op: BinaryOperation, rhs: SoftClamp<K> | IntegerLike): this;
  applyUnchecked(op: BinaryOperation | UnaryOperation, rhs?: SoftClamp<K> | IntegerLike): this {
    const current = this.get();
    let raw: bigint;
    if (op === 'neg' || op === 'not') {
      raw = computeUnary(op, current, this.definition.kind);
    } else {
      if (rhs === undefined) {
        throw new TypeError(`Operator ${op} requires a right-hand side`);
      }
      raw = computeBinary(op, current, this.operand(rhs, op), this.definition.kind);
    }
    this.raw = toKindValue(raw, this.definition.kind, op);
    return this;
  }

  protected withRaw(value: bigint): SoftClamp<K> {
    return new SoftClamp(this.definition, value);
  }

  protected validateStaged(staged: bigint): Result<bigint, OutOfBoundsError> {
    return ok(staged);
  }
}
