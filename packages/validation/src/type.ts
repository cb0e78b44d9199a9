/**
 * Chainable type assertions.
 *
 * A `Type` wraps a zod schema. Every chained check is appended as a
 * fatal refinement, so evaluation stops at the first failing check and
 * that check's message is the one reported.
 *
 * Types are immutable: each chained call returns a new `Type`.
 *
 * @example
 * ```ts
 * const ticker = Type.string("Ticker must be a string")
 *   .length(6, "less", "Ticker must be shorter than 6 characters")
 *   .setName("ticker");
 *
 * ticker.check("TKN");   // true
 * ticker.assert(42);     // throws ValidationError (rule "type")
 * ```
 */

import { z } from "zod";
import type { RefinementCtx, ZodErrorMap, ZodIssue, ZodTypeAny } from "zod";
import { ValidationError, isValidationRule } from "./errors.js";
import type { ValidationRule } from "./errors.js";

/** A fixed message, or one built from the rejected value. */
export type Message = string | ((value: unknown) => string);

/** The value type a `Type` accepts. */
export type Infer<X> = X extends Type<infer U> ? U : never;

/** How `length()` compares: exact when omitted. */
export type LengthMatch = "less" | "greater";

type Primitive = string | number | bigint | boolean | null | undefined;

// =============================================================================
// Issue helpers
// =============================================================================

function render(message: Message, value: unknown): string {
  return typeof message === "string" ? message : message(value);
}

function fail(
  ctx: RefinementCtx,
  rule: ValidationRule,
  message: string,
  path?: (string | number)[],
): void {
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message,
    params: { rule },
    fatal: true,
    ...(path !== undefined && path.length > 0 ? { path } : {}),
  });
}

function ruleOf(issue: ZodIssue): ValidationRule {
  switch (issue.code) {
    case z.ZodIssueCode.custom: {
      const rule: unknown = issue.params?.["rule"];
      return isValidationRule(rule) ? rule : "custom";
    }
    case z.ZodIssueCode.invalid_type:
      return "type";
    case z.ZodIssueCode.unrecognized_keys:
      return "object";
    default:
      return "custom";
  }
}

/** Re-raise a nested type's issue from an enclosing refinement. */
function relay(ctx: RefinementCtx, issue: ZodIssue): void {
  fail(ctx, ruleOf(issue), issue.message, issue.path);
}

function typeErrorMap(expected: string, message?: Message): { errorMap: ZodErrorMap } {
  const text = message ?? `Not of type (${expected})`;
  return { errorMap: (_issue, ctx) => ({ message: render(text, ctx.data) }) };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Type
// =============================================================================

export class Type<T = unknown> {
  private readonly schema: ZodTypeAny;
  private readonly typeName: string | undefined;

  private constructor(schema: ZodTypeAny, typeName?: string) {
    this.schema = schema;
    this.typeName = typeName;
  }

  // ─── Roots ───────────────────────────────────────────────────────

  /** Accepts anything. Starting point for `custom()` chains. */
  static any(): Type<unknown> {
    return new Type<unknown>(z.unknown());
  }

  static string(message?: Message): Type<string> {
    return new Type<string>(z.string(typeErrorMap("string", message)));
  }

  static number(message?: Message): Type<number> {
    return new Type<number>(z.number(typeErrorMap("number", message)));
  }

  static bigint(message?: Message): Type<bigint> {
    return new Type<bigint>(z.bigint(typeErrorMap("bigint", message)));
  }

  static boolean(message?: Message): Type<boolean> {
    return new Type<boolean>(z.boolean(typeErrorMap("boolean", message)));
  }

  /** A plain object (not null, not an array). */
  static table(message?: Message): Type<Record<string, unknown>> {
    return new Type<Record<string, unknown>>(
      z.record(z.string(), z.unknown(), typeErrorMap("table", message)),
    );
  }

  static array(message?: Message): Type<unknown[]> {
    return new Type<unknown[]>(z.array(z.unknown(), typeErrorMap("array", message)));
  }

  static nil(message?: Message): Type<undefined> {
    return new Type<undefined>(z.undefined(typeErrorMap("nil", message)));
  }

  /** Strict equality with a single primitive. */
  static is<V extends Primitive>(expected: V, message?: Message): Type<V> {
    return new Type<V>(
      z.unknown().superRefine((value, ctx) => {
        if (value !== expected) {
          fail(ctx, "is", render(message ?? `Value did not match expected value (Type.is(${String(expected)}))`, value));
        }
      }),
    );
  }

  /** Passes when at least one of `types` passes. */
  static either<U extends readonly Type<unknown>[]>(
    types: U,
    message?: Message,
  ): Type<Infer<U[number]>> {
    return new Type<Infer<U[number]>>(
      z.unknown().superRefine((value, ctx) => {
        if (!types.some((type) => type.check(value))) {
          fail(ctx, "either", render(message ?? "Neither types matched defined in (Type.either(...))", value));
        }
      }),
    );
  }

  /** `undefined`, or a value accepted by `type`. */
  static optional<V>(type: Type<V>): Type<V | undefined> {
    return new Type<V | undefined>(
      z.unknown().superRefine((value, ctx) => {
        if (value === undefined) return;
        const issue = type.firstIssue(value);
        if (issue !== undefined) relay(ctx, issue);
      }),
    );
  }

  /**
   * A plain object whose listed keys each satisfy their type.
   * In strict mode, keys outside the shape are rejected.
   *
   * Without a message, the nested failure is reported with its path.
   */
  static object<S extends Readonly<Record<string, Type<unknown>>>>(
    shape: S,
    strict = false,
    message?: Message,
  ): Type<{ [K in keyof S]: Infer<S[K]> }> {
    const schemas: Record<string, ZodTypeAny> = {};
    for (const [key, type] of Object.entries(shape)) {
      schemas[key] = type.schema;
    }
    const base = z.object(schemas);
    const object = strict ? base.strict() : base.passthrough();

    return new Type<{ [K in keyof S]: Infer<S[K]> }>(
      z.unknown().superRefine((value, ctx) => {
        const result = object.safeParse(value);
        if (result.success) return;

        const issue = result.error.issues[0];
        if (message !== undefined || issue === undefined || issue.path.length === 0) {
          fail(ctx, "object", render(message ?? defaultObjectMessage(issue), value));
          return;
        }
        relay(ctx, issue);
      }),
    );
  }

  /** Passes when `predicate` returns true. */
  static custom(message: Message, predicate: (value: unknown) => boolean): Type<unknown> {
    return Type.any().custom(message, predicate);
  }

  // ─── String checks ───────────────────────────────────────────────

  length(this: Type<string>, len: number, match?: LengthMatch, message?: Message): Type<string> {
    const fallback =
      match === "less"
        ? `String length is not less than ${len}`
        : match === "greater"
          ? `String length is not greater than ${len}`
          : `String is not of length ${len}`;

    return this.refine("length", message ?? fallback, (value) => {
      if (match === "less") return value.length < len;
      if (match === "greater") return value.length > len;
      return value.length === len;
    });
  }

  match(this: Type<string>, pattern: RegExp, message?: Message): Type<string> {
    return this.refine(
      "match",
      message ?? `String did not match pattern "${pattern.source}"`,
      (value) => {
        // Global/sticky patterns carry lastIndex between calls.
        pattern.lastIndex = 0;
        return pattern.test(value);
      },
    );
  }

  // ─── Numeric checks ──────────────────────────────────────────────

  integer<N extends number | bigint>(this: Type<N>, message?: Message): Type<N> {
    return this.refine("integer", message ?? "Number is not an integer", (value) => {
      const n: number | bigint = value;
      return typeof n === "bigint" || Number.isInteger(n);
    });
  }

  greaterThan<N extends number | bigint>(this: Type<N>, bound: N, message?: Message): Type<N> {
    return this.refine(
      "greater_than",
      message ?? `Number is not greater than ${String(bound)}`,
      (value) => value > bound,
    );
  }

  lessThan<N extends number | bigint>(this: Type<N>, bound: N, message?: Message): Type<N> {
    return this.refine(
      "less_than",
      message ?? `Number is not less than ${String(bound)}`,
      (value) => value < bound,
    );
  }

  even<N extends number | bigint>(this: Type<N>, message?: Message): Type<N> {
    return this.refine("even", message ?? "Number is not even", (value) => {
      const n: number | bigint = value;
      return typeof n === "bigint" ? n % 2n === 0n : n % 2 === 0;
    });
  }

  odd<N extends number | bigint>(this: Type<N>, message?: Message): Type<N> {
    return this.refine("odd", message ?? "Number is not odd", (value) => {
      const n: number | bigint = value;
      return typeof n === "bigint" ? n % 2n !== 0n : Math.abs(n % 2) === 1;
    });
  }

  // ─── Table checks ────────────────────────────────────────────────

  keys(this: Type<Record<string, unknown>>, type: Type<string>, message?: Message): Type<Record<string, unknown>> {
    return this.refine("keys", message ?? "Invalid table keys", (value) =>
      Object.keys(value).every((key) => type.check(key)),
    );
  }

  values<V>(this: Type<Record<string, unknown>>, type: Type<V>, message?: Message): Type<Record<string, V>> {
    return new Type<Record<string, V>>(
      this.schema.superRefine((value, ctx) => {
        if (!isPlainObject(value) || !Object.values(value).every((entry) => type.check(entry))) {
          fail(ctx, "values", render(message ?? "Invalid table values", value));
        }
      }),
      this.typeName,
    );
  }

  // ─── Generic checks ──────────────────────────────────────────────

  /** Strict equality, keeping the current type. */
  is(expected: unknown, message?: Message): Type<T> {
    return this.refine(
      "is",
      message ?? `Value did not match expected value (Type.is(${String(expected)}))`,
      (value) => value === expected,
    );
  }

  /** Fails when the value is accepted by `type`. */
  isNot(type: Type<unknown>, message?: Message): Type<T> {
    return this.refine(
      "is_not",
      message ?? "Value incorrectly matched with the assertion provided (Type.isNot())",
      (value) => !type.check(value),
    );
  }

  custom(message: Message, predicate: (value: T) => boolean): Type<T> {
    return this.refine("custom", message, predicate);
  }

  /** Label this type; the name is carried on every `ValidationError` it raises. */
  setName(name: string): Type<T> {
    return new Type<T>(this.schema, name);
  }

  get name(): string | undefined {
    return this.typeName;
  }

  // ─── Evaluation ──────────────────────────────────────────────────

  check(value: unknown): value is T {
    return this.firstIssue(value) === undefined;
  }

  /**
   * Return the value typed as `T`, or throw the first failing check.
   */
  assert(value: unknown): T {
    if (this.check(value)) return value;
    throw this.toError(value);
  }

  private toError(value: unknown): ValidationError {
    const issue = this.firstIssue(value);
    if (issue === undefined) {
      return new ValidationError("custom", "Value failed validation", { typeName: this.typeName });
    }
    return new ValidationError(ruleOf(issue), issue.message, {
      path: issue.path,
      typeName: this.typeName,
    });
  }

  private firstIssue(value: unknown): ZodIssue | undefined {
    const result = this.schema.safeParse(value);
    return result.success ? undefined : result.error.issues[0];
  }

  private refine(rule: ValidationRule, message: Message, predicate: (value: T) => boolean): Type<T> {
    return new Type<T>(
      this.schema.superRefine((value, ctx) => {
        if (!predicate(value)) fail(ctx, rule, render(message, value));
      }),
      this.typeName,
    );
  }
}

function defaultObjectMessage(issue: ZodIssue | undefined): string {
  if (issue !== undefined && issue.code === z.ZodIssueCode.unrecognized_keys) {
    return `Unexpected keys: ${issue.keys.join(", ")}`;
  }
  return "Not of defined object";
}
