/**
 * Behavior shared by {@link HardClamp} and {@link SoftClamp}: the operator
 * surface, guard leasing, comparison and serialization.
 *
 * @module
 */

import type { BehaviorKind } from '../bounds/behavior.js';
import { Guard, GuardLease } from '../guard/guard.js';
import type { GuardBinding } from '../guard/guard.js';
import { toBigInt, toKindValue } from '../numeric/kinds.js';
import type { IntegerLike } from '../numeric/kinds.js';
import { encodeRaw } from '../serde/codec.js';
import type { RawJson } from '../serde/codec.js';
import { DefinitionMismatchError } from '../types/errors.js';
import type { OutOfBoundsError } from '../types/errors.js';
import type { Result } from '../types/result.js';
import { applyBinary, applyUnary } from './arithmetic.js';
import type { BinaryOperation, UnaryOperation } from './arithmetic.js';
import { sameDefinition } from './definition.js';
import type { ClampDefinition } from './definition.js';

/** Guard over a clamp: staged values are integers of the clamp's kind. */
export type ClampGuard = Guard<bigint, OutOfBoundsError, IntegerLike>;

export abstract class ClampBase<K extends BehaviorKind, Self extends ClampBase<K, Self>> {
  readonly definition: ClampDefinition<K>;
  protected raw: bigint;
  private readonly lease: GuardLease;

  protected constructor(definition: ClampDefinition<K>, value: bigint) {
    this.definition = definition;
    this.raw = value;
    this.lease = new GuardLease(definition.name);
  }

  /** Build a sibling clamp of the same definition holding `value`. */
  protected abstract withRaw(value: bigint): Self;

  /** Commit-time validation for guards over this clamp. */
  protected abstract validateStaged(staged: bigint): Result<bigint, OutOfBoundsError>;

  /** Read the current value. Fails while a guard is open. */
  get(): bigint {
    this.requireFree();
    return this.raw;
  }

  /** Throws while a guard holds this clamp. */
  protected requireFree(): void {
    this.lease.assertFree();
  }

  /** True while a guard holds this clamp. */
  get isLeased(): boolean {
    return this.lease.isHeld;
  }

  /**
   * Open a guard over this clamp. The clamp cannot be read or written until
   * the guard is committed or cancelled; a guard dropped while open locks the
   * clamp for good. {@link edit} cancels it on return.
   */
  modify(): ClampGuard {
    const current = this.get();
    const binding: GuardBinding<bigint, OutOfBoundsError, IntegerLike> = {
      label: this.definition.name,
      coerce: (input) => toKindValue(input, this.definition.kind, 'guard write'),
      clone: (value) => value,
      equals: (a, b) => a === b,
      validate: (staged) => this.validateStaged(staged),
      write: (value) => {
        this.raw = value;
      },
      release: () => this.lease.release(),
    };
    const guard = new Guard(current, binding);
    this.lease.acquire();
    return guard;
  }

  /**
   * Run `fn` with a guard over this clamp; the guard is cancelled if `fn`
   * leaves it open.
   *
   * @example
   * ```typescript
   * clamp.edit((guard) => {
   *   guard.set(8);
   *   guard.commitOrThrow();
   * });
   * ```
   */
  edit<R>(fn: (guard: ClampGuard) => R): R {
    return this.modify().scoped(fn);
  }

  protected operand(rhs: Self | IntegerLike, op: BinaryOperation): bigint {
    if (typeof rhs === 'number' || typeof rhs === 'bigint') {
      return toKindValue(rhs, this.definition.kind, op);
    }
    if (!sameDefinition(rhs.definition, this.definition)) {
      throw new DefinitionMismatchError(this.definition.name, rhs.definition.name);
    }
    return rhs.get();
  }

  protected binary(op: BinaryOperation, rhs: Self | IntegerLike): bigint {
    return applyBinary(op, this.get(), this.operand(rhs, op), this.definition);
  }

  protected unary(op: UnaryOperation): bigint {
    return applyUnary(op, this.get(), this.definition);
  }

  private assign(value: bigint): this {
    this.raw = value;
    return this;
  }

  // Arithmetic by value: return a new clamp, leave this one unchanged.

  add(rhs: Self | IntegerLike): Self {
    return this.withRaw(this.binary('add', rhs));
  }

  sub(rhs: Self | IntegerLike): Self {
    return this.withRaw(this.binary('sub', rhs));
  }

  mul(rhs: Self | IntegerLike): Self {
    return this.withRaw(this.binary('mul', rhs));
  }

  div(rhs: Self | IntegerLike): Self {
    return this.withRaw(this.binary('div', rhs));
  }

  rem(rhs: Self | IntegerLike): Self {
    return this.withRaw(this.binary('rem', rhs));
  }

  bitAnd(rhs: Self | IntegerLike): Self {
    return this.withRaw(this.binary('bitand', rhs));
  }

  bitOr(rhs: Self | IntegerLike): Self {
    return this.withRaw(this.binary('bitor', rhs));
  }

  bitXor(rhs: Self | IntegerLike): Self {
    return this.withRaw(this.binary('bitxor', rhs));
  }

  shl(rhs: Self | IntegerLike): Self {
    return this.withRaw(this.binary('shl', rhs));
  }

  shr(rhs: Self | IntegerLike): Self {
    return this.withRaw(this.binary('shr', rhs));
  }

  neg(): Self {
    return this.withRaw(this.unary('neg'));
  }

  not(): Self {
    return this.withRaw(this.unary('not'));
  }

  // Arithmetic in place. A failing operation leaves the value unchanged.

  addAssign(rhs: Self | IntegerLike): this {
    return this.assign(this.binary('add', rhs));
  }

  subAssign(rhs: Self | IntegerLike): this {
    return this.assign(this.binary('sub', rhs));
  }

  mulAssign(rhs: Self | IntegerLike): this {
    return this.assign(this.binary('mul', rhs));
  }

  divAssign(rhs: Self | IntegerLike): this {
    return this.assign(this.binary('div', rhs));
  }

  remAssign(rhs: Self | IntegerLike): this {
    return this.assign(this.binary('rem', rhs));
  }

  bitAndAssign(rhs: Self | IntegerLike): this {
    return this.assign(this.binary('bitand', rhs));
  }

  bitOrAssign(rhs: Self | IntegerLike): this {
    return this.assign(this.binary('bitor', rhs));
  }

  bitXorAssign(rhs: Self | IntegerLike): this {
    return this.assign(this.binary('bitxor', rhs));
  }

  shlAssign(rhs: Self | IntegerLike): this {
    return this.assign(this.binary('shl', rhs));
  }

  shrAssign(rhs: Self | IntegerLike): this {
    return this.assign(this.binary('shr', rhs));
  }

  negAssign(): this {
    return this.assign(this.unary('neg'));
  }

  notAssign(): this {
    return this.assign(this.unary('not'));
  }

  // Comparison

  equals(other: Self | IntegerLike): boolean {
    return this.compare(other) === 0;
  }

  compare(other: Self | IntegerLike): -1 | 0 | 1 {
    const lhs = this.get();
    const rhs =
      typeof other === 'number' || typeof other === 'bigint'
        ? toBigInt(other, this.definition.kind)
        : other.get();
    if (lhs < rhs) return -1;
    if (lhs > rhs) return 1;
    return 0;
  }

  toString(): string {
    return this.get().toString();
  }

  /** Serialize to the raw value only. */
  toJSON(): RawJson {
    return encodeRaw(this.get());
  }
}
