/**
 * Validators and ready-made validator constructors.
 *
 * @module
 */

import type { z } from 'zod';
import type { ClampDefinition } from '../clamp/definition.js';
import type { IntegerLike } from '../numeric/kinds.js';
import { mergeValidationResults, validationResult } from '../utils/validation.js';
import type { ValidationResult } from '../utils/validation.js';

/** Decides whether an item is acceptable. Must be deterministic. */
export interface Validator<T> {
  validate(item: T): ValidationResult;
}

/**
 * Validator from a predicate. `reason` may depend on the rejected item.
 *
 * @example
 * ```typescript
 * const notSeven = predicateValidator((n: number) => n !== 7, 'must not be 7');
 * ```
 */
export function predicateValidator<T>(
  predicate: (item: T) => boolean,
  reason: string | ((item: T) => string),
): Validator<T> {
  return {
    validate(item) {
      if (predicate(item)) {
        return validationResult([]);
      }
      return validationResult([typeof reason === 'string' ? reason : reason(item)]);
    },
  };
}

/** Use a zod schema as a validator. Every issue becomes one error. */
export function zodValidator<T>(schema: z.ZodType<T>): Validator<T> {
  return {
    validate(item) {
      const parsed = schema.safeParse(item);
      if (parsed.success) {
        return validationResult([]);
      }
      return validationResult(
        parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        ),
      );
    },
  };
}

/** Accepts integers inside the definition's limits. */
export function clampValidator(definition: ClampDefinition): Validator<IntegerLike> {
  const { limits } = definition;
  return {
    validate(item) {
      if (typeof item === 'number' && !Number.isInteger(item)) {
        return validationResult([`${item} is not an integer`]);
      }
      const value = BigInt(item);
      return validationResult(limits.contains(value) ? [] : [`${value} is outside ${limits.toString()}`]);
    },
  };
}

/** Runs every validator and reports all of their errors. */
export function allOf<T>(...validators: Validator<T>[]): Validator<T> {
  return {
    validate(item) {
      return mergeValidationResults(validators.map((validator) => validator.validate(item)));
    },
  };
}
