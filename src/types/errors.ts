/**
 * Error types and utilities for bounded-values
 *
 * Provides the base error class, string error codes, and the specific error
 * classes raised by limits, clamps, guards and views.
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * String error codes for every error the library raises.
 */
export const BoundedErrorCodes = {
  /** A value lies outside the declared limits */
  OUT_OF_BOUNDS: 'OUT_OF_BOUNDS',
  /** A validator rejected an item */
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  /** Limits or a clamp definition were rejected when they were fixed */
  CONFIGURATION_INVALID: 'CONFIGURATION_INVALID',
  /** Division or remainder by zero */
  DIVIDE_BY_ZERO: 'DIVIDE_BY_ZERO',
  /** A value or result does not fit the machine width */
  MACHINE_OVERFLOW: 'MACHINE_OVERFLOW',
  /** Text or a raw value could not be read as an integer */
  PARSE_FAILED: 'PARSE_FAILED',
  /** The owner is leased to an open guard */
  GUARD_ACTIVE: 'GUARD_ACTIVE',
  /** A guard or view was used after reaching a terminal outcome */
  CONSUMED: 'CONSUMED',
  /** Two clamps with different definitions were combined */
  DEFINITION_MISMATCH: 'DEFINITION_MISMATCH',
} as const;

/** Union type of all error code values */
export type BoundedErrorCode = (typeof BoundedErrorCodes)[keyof typeof BoundedErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for all library errors.
 *
 * @example
 * ```typescript
 * try {
 *   HardClamp.create(Percent, 150);
 * } catch (err) {
 *   if (err instanceof BoundedError) {
 *     console.log(`${err.code}: ${err.message}`);
 *   }
 * }
 * ```
 */
export class BoundedError extends Error {
  public readonly code: BoundedErrorCode;

  constructor(message: string, code: BoundedErrorCode) {
    super(message);
    this.name = 'BoundedError';
    this.code = code;
    // Using this.constructor hides subclass constructors from the stack.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

/**
 * Error thrown (or returned) when a value lies outside `[lower, upper]`.
 *
 * @example
 * ```typescript
 * const result = HardClamp.validate(Percent, 101);
 * if (!result.ok) {
 *   console.log(result.error.direction); // 'above'
 * }
 * ```
 */
export class OutOfBoundsError extends BoundedError {
  public readonly value: bigint;
  public readonly lower: bigint;
  public readonly upper: bigint;
  /** Which bound was violated. */
  public readonly direction: 'below' | 'above';

  constructor(value: bigint, lower: bigint, upper: bigint) {
    super(`Value ${value} is out of bounds [${lower}, ${upper}]`, BoundedErrorCodes.OUT_OF_BOUNDS);
    this.name = 'OutOfBoundsError';
    this.value = value;
    this.lower = lower;
    this.upper = upper;
    this.direction = value < lower ? 'below' : 'above';
  }
}

/**
 * Error raised when a validator rejects a view's item.
 */
export class ValidationFailedError extends BoundedError {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Validation failed: ${reason}`, BoundedErrorCodes.VALIDATION_FAILED);
    this.name = 'ValidationFailedError';
    this.reason = reason;
  }
}

/**
 * Error thrown when limits, a clamp definition or the library configuration
 * are rejected at the point they are fixed.
 *
 * @example
 * ```typescript
 * Limits.of('u8', { lower: 10, upper: 5 }); // throws ConfigurationInvalidError
 * ```
 */
export class ConfigurationInvalidError extends BoundedError {
  public readonly lower: bigint | undefined;
  public readonly upper: bigint | undefined;

  constructor(message: string, lower?: bigint, upper?: bigint) {
    super(`Invalid configuration: ${message}`, BoundedErrorCodes.CONFIGURATION_INVALID);
    this.name = 'ConfigurationInvalidError';
    this.lower = lower;
    this.upper = upper;
  }
}

/**
 * Error thrown on division or remainder by zero, whatever the behavior.
 */
export class DivideByZeroError extends BoundedError {
  public readonly operation: string;

  constructor(operation: string) {
    super(`Attempted ${operation} by zero`, BoundedErrorCodes.DIVIDE_BY_ZERO);
    this.name = 'DivideByZeroError';
    this.operation = operation;
  }
}

/**
 * Error thrown when an operand or result cannot be represented at machine
 * width. Never resolved by a behavior.
 */
export class MachineOverflowError extends BoundedError {
  public readonly operation: string;
  public readonly kind: string;

  constructor(operation: string, kind: string, detail: string) {
    super(`Machine overflow in ${operation} (${kind}): ${detail}`, BoundedErrorCodes.MACHINE_OVERFLOW);
    this.name = 'MachineOverflowError';
    this.operation = operation;
    this.kind = kind;
  }
}

/**
 * Error thrown when text or a decoded raw value is not an integer of the
 * target kind.
 */
export class ParseFailedError extends BoundedError {
  public readonly input: string;
  public readonly kind: string;

  constructor(input: string, kind: string, reason: string) {
    super(`Cannot parse "${input}" as ${kind}: ${reason}`, BoundedErrorCodes.PARSE_FAILED);
    this.name = 'ParseFailedError';
    this.input = input;
    this.kind = kind;
  }
}

/**
 * Error thrown when an owner is read, written or guarded while another guard
 * holds its lease.
 */
export class GuardActiveError extends BoundedError {
  public readonly owner: string;

  constructor(owner: string) {
    super(`${owner} is leased to an open guard`, BoundedErrorCodes.GUARD_ACTIVE);
    this.name = 'GuardActiveError';
    this.owner = owner;
  }
}

/**
 * Error thrown when a guard or view is used after its terminal outcome.
 */
export class ConsumedError extends BoundedError {
  public readonly subject: 'guard' | 'view';
  public readonly outcome: string;

  constructor(subject: 'guard' | 'view', outcome: string) {
    super(`The ${subject} was already ${outcome}`, BoundedErrorCodes.CONSUMED);
    this.name = 'ConsumedError';
    this.subject = subject;
    this.outcome = outcome;
  }
}

/**
 * Error thrown when an operation combines clamps of different definitions.
 */
export class DefinitionMismatchError extends BoundedError {
  public readonly expected: string;
  public readonly received: string;

  constructor(expected: string, received: string) {
    super(
      `Cannot combine clamp "${received}" with clamp "${expected}"`,
      BoundedErrorCodes.DEFINITION_MISMATCH,
    );
    this.name = 'DefinitionMismatchError';
    this.expected = expected;
    this.received = received;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Type guard to check if an error is a BoundedError.
 *
 * @example
 * ```typescript
 * try {
 *   clamp.divAssign(0);
 * } catch (err) {
 *   if (isBoundedError(err)) {
 *     console.log(err.code); // 'DIVIDE_BY_ZERO'
 *   }
 * }
 * ```
 */
export function isBoundedError(error: unknown): error is BoundedError {
  return error instanceof BoundedError;
}
