/**
 * bounded-values - bounded integers, validated views and staged mutation
 *
 * Main entry point. Re-exports the clamp types, the guard protocol, views and
 * validators, errors, configuration and logging.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Bounds
export { Limits, type LimitsInput } from './bounds/limits.js';
export {
  Panicking,
  Saturating,
  behaviorFor,
  resolveWithin,
  type Behavior,
  type BehaviorKind,
} from './bounds/behavior.js';

// Integer kinds
export {
  INTEGER_KIND_NAMES,
  INTEGER_KINDS,
  isIntegerKindName,
  resolveKind,
  fitsKind,
  toBigInt,
  toKindValue,
  parseInteger,
  type IntegerKind,
  type IntegerKindName,
  type IntegerLike,
} from './numeric/kinds.js';
export { randomInRange } from './numeric/random.js';

// Clamps
export * from './clamp/index.js';

// Guards
export {
  Guard,
  GuardLease,
  type GuardBinding,
  type GuardOutcome,
  type GuardState,
  type CommitResult,
} from './guard/guard.js';

// Views
export * from './view/index.js';

// Serialization
export { encodeRaw, decodeRaw, decodeItem, type RawJson, type ItemSchema } from './serde/codec.js';

// Errors and results
export {
  BoundedErrorCodes,
  BoundedError,
  OutOfBoundsError,
  ValidationFailedError,
  ConfigurationInvalidError,
  DivideByZeroError,
  MachineOverflowError,
  ParseFailedError,
  GuardActiveError,
  ConsumedError,
  DefinitionMismatchError,
  isBoundedError,
  type BoundedErrorCode,
} from './types/errors.js';
export { ok, err, unwrapResult, type Result } from './types/result.js';
export {
  validationResult,
  mergeValidationResults,
  formatValidationErrors,
  type ValidationResult,
} from './utils/validation.js';

// Configuration and logging
export {
  configure,
  configureFromEnv,
  configFromEnv,
  getConfig,
  resetConfig,
  getLogger,
  getRandomSource,
  LOG_LEVEL_ENV,
  type BoundedConfig,
  type RandomSource,
} from './config.js';
export {
  createLogger,
  formatLogLine,
  silentLogger,
  DEFAULT_LOG_PREFIX,
  type Logger,
  type LogLevel,
  type LogThreshold,
} from './utils/logger.js';
