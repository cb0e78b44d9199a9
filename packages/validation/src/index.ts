/**
 * @ledgerkit/validation
 *
 * Chainable type assertions and the shared field rules every ledger
 * operation checks its inputs against.
 */

export { Type } from "./type.js";
export type { Infer, LengthMatch, Message } from "./type.js";

export { Validator } from "./validator.js";
export type { Validated } from "./validator.js";

export {
  addressType,
  quantityType,
  balanceType,
  nonEmptyStringType,
  oneOfType,
} from "./rules.js";

export { ValidationError, isValidationRule } from "./errors.js";
export type { ValidationErrorOptions, ValidationRule } from "./errors.js";
