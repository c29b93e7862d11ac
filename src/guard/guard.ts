/**
 * Staged-mutation guard.
 *
 * A guard holds a scratch copy of its owner's value. Writes go to the copy;
 * the owner only changes on a successful {@link Guard.commit}. The owner is
 * leased to the guard until it is committed or cancelled.
 *
 * @module
 */

import { getLogger } from '../config.js';
import { ConsumedError, GuardActiveError } from '../types/errors.js';
import type { Result } from '../types/result.js';

export type GuardState = 'unchanged' | 'changed';

export type GuardOutcome = 'open' | 'committed' | 'cancelled';

export type CommitResult<T, E, G> = { ok: true; value: T } | { ok: false; error: E; guard: G };

/**
 * The owner's side of a guard: how staged values are copied, compared,
 * validated and finally written back.
 */
export interface GuardBinding<T, E extends Error, I = T> {
  /** Owner description used in errors and log lines. */
  readonly label: string;
  /** Turn a staged write into a value of the owner's type. May throw. */
  coerce(input: I): T;
  clone(value: T): T;
  equals(a: T, b: T): boolean;
  /** Commit-time validation. The accepted value is what gets written. */
  validate(staged: T): Result<T, E>;
  write(value: T): void;
  release(): void;
}

export class Guard<T, E extends Error, I = T> {
  private readonly binding: GuardBinding<T, E, I>;
  private readonly snapshot: T;
  private staged: T;
  private state: GuardOutcome = 'open';

  constructor(current: T, binding: GuardBinding<T, E, I>) {
    this.binding = binding;
    this.snapshot = binding.clone(current);
    this.staged = binding.clone(current);
    getLogger().debug(`Guard opened on ${binding.label}`);
  }

  get outcome(): GuardOutcome {
    return this.state;
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  /** Read the staged value. */
  get(): T {
    this.requireOpen();
    return this.staged;
  }

  get value(): T {
    return this.get();
  }

  /** Replace the staged value. The owner is not touched. */
  set(input: I): this {
    this.requireOpen();
    this.staged = this.binding.coerce(input);
    return this;
  }

  update(fn: (staged: T) => I): this {
    this.requireOpen();
    this.staged = this.binding.coerce(fn(this.staged));
    return this;
  }

  /** `changed` iff the staged value differs from the snapshot. */
  check(): GuardState {
    this.requireOpen();
    return this.binding.equals(this.staged, this.snapshot) ? 'unchanged' : 'changed';
  }

  isChanged(): boolean {
    return this.check() === 'changed';
  }

  /** Run the commit-time validation without committing. */
  validate(): Result<T, E> {
    this.requireOpen();
    return this.binding.validate(this.staged);
  }

  /**
   * Validate the staged value and write it to the owner. On failure the
   * owner is left untouched and the guard stays open, so the caller can
   * retry with another value or cancel.
   */
  commit(): CommitResult<T, E, this> {
    this.requireOpen();
    const result = this.binding.validate(this.staged);
    if (!result.ok) {
      getLogger().debug(`Guard commit rejected on ${this.binding.label}: ${result.error.message}`);
      return { ok: false, error: result.error, guard: this };
    }
    this.binding.write(result.value);
    this.finish('committed');
    return { ok: true, value: result.value };
  }

  /** Commit, or throw the validation error and leave the guard open. */
  commitOrThrow(): T {
    const result = this.commit();
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  /** Discard the staged value. The owner is not touched. */
  cancel(): void {
    this.requireOpen();
    this.finish('cancelled');
  }

  /**
   * Run `fn` with this guard. If `fn` returns or throws while the guard is
   * still open, the guard is cancelled. `fn` must be synchronous.
   */
  scoped<R>(fn: (guard: this) => R): R {
    this.requireOpen();
    try {
      return fn(this);
    } finally {
      if (this.isOpen()) {
        if (this.isChanged()) {
          getLogger().warn(`Guard on ${this.binding.label} left open with staged changes; cancelling`);
        }
        this.cancel();
      }
    }
  }

  private finish(outcome: 'committed' | 'cancelled'): void {
    this.state = outcome;
    this.binding.release();
    getLogger().debug(`Guard ${outcome} on ${this.binding.label}`);
  }

  private requireOpen(): void {
    if (this.state !== 'open') {
      throw new ConsumedError('guard', this.state);
    }
  }
}

/**
 * Exclusive lease an owner hands to at most one guard at a time.
 */
export class GuardLease {
  private held = false;

  constructor(private readonly label: string) {}

  get isHeld(): boolean {
    return this.held;
  }

  acquire(): void {
    this.assertFree();
    this.held = true;
  }

  release(): void {
    this.held = false;
  }

  /** Throw {@link GuardActiveError} while a guard holds the lease. */
  assertFree(): void {
    if (this.held) {
      throw new GuardActiveError(this.label);
    }
  }
}
