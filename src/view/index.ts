/**
 * Validators and views.
 *
 * @module
 */

export { View, type ViewGuard, type ViewOptions } from './view.js';
export {
  predicateValidator,
  zodValidator,
  clampValidator,
  allOf,
  type Validator,
} from './validator.js';
