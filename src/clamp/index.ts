/**
 * Clamp types, definitions and the builder.
 *
 * @module
 */

export {
  defineClamp,
  sameDefinition,
  type BoundsCapability,
  type BehaviorCapability,
  type ConversionCapability,
  type ClampDefinition,
  type ClampOptions,
} from './definition.js';
export { ClampBase, type ClampGuard } from './base.js';
export { HardClamp } from './hard.js';
export { SoftClamp } from './soft.js';
export {
  ClampBuilder,
  clampOf,
  hardClampFactory,
  softClampFactory,
  type ClampFactory,
  type HardClampFactory,
  type SoftClampFactory,
} from './builder.js';
export {
  REGISTER_MIN,
  REGISTER_MAX,
  computeBinary,
  computeUnary,
  applyBinary,
  applyUnary,
  type ArithmeticContext,
  type BinaryOperation,
  type UnaryOperation,
} from './arithmetic.js';
