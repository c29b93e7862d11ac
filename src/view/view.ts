/**
 * View - an arbitrary item paired with a validator.
 *
 * A view may hold an invalid item; validity is checked on demand and at guard
 * commit, never on construction or direct mutation.
 *
 * @module
 */

import { isDeepStrictEqual } from 'node:util';
import { getLogger } from '../config.js';
import { Guard, GuardLease } from '../guard/guard.js';
import { decodeItem, encodeRaw } from '../serde/codec.js';
import type { ItemSchema, RawJson } from '../serde/codec.js';
import { ConsumedError, ValidationFailedError } from '../types/errors.js';
import { err, ok } from '../types/result.js';
import type { Result } from '../types/result.js';
import { formatValidationErrors } from '../utils/validation.js';
import type { ValidationResult } from '../utils/validation.js';
import { assertCopyable, copyItem } from './copy.js';
import type { Validator } from './validator.js';

export interface ViewOptions<T> {
  /** Label used in errors and log lines. Defaults to `View`. */
  name?: string;
  /**
   * Copy used for guard snapshots. The default deep-copies plain data and
   * rejects class instances and functions, which need their own copy.
   */
  clone?: (item: T) => T;
  /** Staged-change detection. Defaults to `isDeepStrictEqual`. */
  equals?: (a: T, b: T) => boolean;
}

export type ViewGuard<T> = Guard<T, ValidationFailedError>;

type ViewOutcome = 'unwrapped' | 'cancelled';

export class View<T> {
  readonly validator: Validator<T>;
  readonly name: string;
  private item: T;
  private readonly clone: (item: T) => T;
  private readonly equals: (a: T, b: T) => boolean;
  private readonly lease: GuardLease;
  private outcome: ViewOutcome | null = null;

  private constructor(item: T, validator: Validator<T>, options: ViewOptions<T>) {
    this.item = item;
    this.validator = validator;
    this.name = options.name ?? 'View';
    this.clone = options.clone ?? ((value) => copyItem(value, this.name));
    this.equals = options.equals ?? ((a, b) => isDeepStrictEqual(a, b));
    this.lease = new GuardLease(this.name);
  }

  /**
   * Pair `item` with `validator`. Succeeds whether or not the item is valid;
   * without a `clone` option the item must be plain data
   * (`ConfigurationInvalidError` otherwise).
   *
   * @example
   * ```typescript
   * const view = View.withValidator(3, predicateValidator((n: number) => n !== 7, 'must not be 7'));
   * ```
   */
  static withValidator<T>(item: T, validator: Validator<T>, options: ViewOptions<T> = {}): View<T> {
    if (options.clone === undefined) {
      assertCopyable(item, options.name ?? 'View');
    }
    return new View(item, validator, options);
  }

  /**
   * Decode an item checked against `schema` for shape only. The validator is
   * not consulted, so the decoded view may be invalid.
   */
  static fromJSON<T>(
    raw: unknown,
    schema: ItemSchema<T>,
    validator: Validator<T>,
    options: ViewOptions<T> = {},
  ): View<T> {
    return View.withValidator(decodeItem(raw, schema), validator, options);
  }

  get isConsumed(): boolean {
    return this.outcome !== null;
  }

  get isLeased(): boolean {
    return this.lease.isHeld;
  }

  get(): T {
    this.requireUsable();
    return this.item;
  }

  /** Replace the item without validation. */
  set(item: T): this {
    this.requireUsable();
    this.item = item;
    return this;
  }

  update(fn: (item: T) => T): this {
    return this.set(fn(this.get()));
  }

  validate(): ValidationResult {
    return this.validator.validate(this.get());
  }

  isValid(): boolean {
    return this.validate().valid;
  }

  check(): Result<void, ValidationFailedError> {
    const result = this.validate();
    return result.valid ? ok(undefined) : err(new ValidationFailedError(formatValidationErrors(result)));
  }

  /**
   * Open a guard whose commit runs the validator. The view stays leased until
   * the guard is committed or cancelled; a guard that is dropped while open
   * locks the view for good, so prefer {@link edit} unless the guard has to
   * outlive a single call.
   */
  modify(): ViewGuard<T> {
    this.requireUsable();
    const guard = new Guard<T, ValidationFailedError>(this.item, {
      label: this.name,
      coerce: (input) => input,
      clone: this.clone,
      equals: this.equals,
      validate: (staged) => {
        const result = this.validator.validate(staged);
        return result.valid ? ok(staged) : err(new ValidationFailedError(formatValidationErrors(result)));
      },
      write: (value) => {
        this.item = value;
      },
      release: () => this.lease.release(),
    });
    this.lease.acquire();
    return guard;
  }

  /** Run `fn` with a guard; the guard is cancelled if `fn` leaves it open. */
  edit<R>(fn: (guard: ViewGuard<T>) => R): R {
    return this.modify().scoped(fn);
  }

  /**
   * Take the item out if it is valid. Otherwise the view itself comes back,
   * item and validator intact, and stays usable.
   */
  tryUnwrap(): Result<T, View<T>> {
    if (!this.isValid()) {
      return err(this);
    }
    const item = this.item;
    this.outcome = 'unwrapped';
    return ok(item);
  }

  /** Like {@link tryUnwrap}, throwing {@link ValidationFailedError} for an invalid item. */
  unwrap(): T {
    const result = this.check();
    if (!result.ok) {
      throw result.error;
    }
    const item = this.item;
    this.outcome = 'unwrapped';
    return item;
  }

  /** Discard the view, valid or not. */
  cancel(): void {
    this.requireUsable();
    this.outcome = 'cancelled';
    getLogger().debug(`${this.name} discarded`);
  }

  /**
   * Serialize to the item only. A `bigint` item is encoded like a clamp's raw
   * value; bigints nested inside an object item are left to the caller.
   */
  toJSON(): T | RawJson {
    const item = this.get();
    return typeof item === 'bigint' ? encodeRaw(item) : item;
  }

  private requireUsable(): void {
    if (this.outcome !== null) {
      throw new ConsumedError('view', this.outcome);
    }
    this.lease.assertFree();
  }
}
