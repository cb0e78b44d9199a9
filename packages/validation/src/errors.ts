/**
 * @ledgerkit/validation — Validation errors.
 *
 * A failed check always throws. The `rule` names the check that
 * rejected the value, so callers can tell failures apart by cause
 * without parsing messages.
 */

/** The check that rejected a value. */
export type ValidationRule =
  | "type"
  | "length"
  | "match"
  | "integer"
  | "greater_than"
  | "less_than"
  | "even"
  | "odd"
  | "is"
  | "either"
  | "is_not"
  | "object"
  | "keys"
  | "values"
  | "custom"
  | "required"
  | "quantity";

const RULES = new Set<string>([
  "type", "length", "match", "integer", "greater_than", "less_than",
  "even", "odd", "is", "either", "is_not", "object", "keys", "values",
  "custom", "required", "quantity",
]);

export function isValidationRule(value: unknown): value is ValidationRule {
  return typeof value === "string" && RULES.has(value);
}

export interface ValidationErrorOptions {
  /** Location of the rejected value inside a structure */
  readonly path?: readonly (string | number)[] | undefined;

  /** Name given to the type with `setName()` */
  readonly typeName?: string | undefined;
}

/**
 * Structured error from a type assertion.
 */
export class ValidationError extends Error {
  public readonly code = "VALIDATION_FAILED";
  public readonly rule: ValidationRule;
  public readonly path: readonly (string | number)[];
  public readonly typeName: string | undefined;

  constructor(rule: ValidationRule, message: string, options?: ValidationErrorOptions) {
    super(message);
    this.name = "ValidationError";
    this.rule = rule;
    this.path = options?.path ?? [];
    this.typeName = options?.typeName;
  }
}
