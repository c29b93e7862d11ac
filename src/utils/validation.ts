/**
 * Accumulate-errors validation results.
 *
 * Validators report every problem they find at once; the joined error list is
 * the failure reason.
 *
 * @module
 */

/** Outcome of an accumulate-errors validation pass. */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/** Build a {@link ValidationResult} from an error list. */
export function validationResult(errors: string[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}

/** Merge several results, keeping every error in order. */
export function mergeValidationResults(results: readonly ValidationResult[]): ValidationResult {
  return validationResult(results.flatMap((result) => result.errors));
}

export function formatValidationErrors(result: ValidationResult): string {
  return result.errors.join('; ');
}
