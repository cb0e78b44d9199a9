/**
 * Validator: a named set of types checked together.
 *
 * Used at module boundaries where several fields of one payload are
 * validated in sequence. The first field that fails throws; nothing
 * after it is checked.
 */

import type { Infer, Type } from "./type.js";

type TypeMap = Readonly<Record<string, Type<unknown>>>;

/** The validated subset of a payload. */
export type Validated<S extends TypeMap, K extends keyof S> = {
  readonly [P in K]: Infer<S[P]>;
};

export class Validator<S extends TypeMap> {
  private readonly types: { readonly [P in keyof S]: Type<unknown> };

  constructor(types: S) {
    this.types = types;
  }

  /** Check one named field. Returns the validator for chaining. */
  validateType<K extends keyof S & string>(key: K, value: unknown): this {
    this.types[key].assert(value);
    return this;
  }

  /**
   * Check the listed fields of `payload` in order and return the
   * payload typed as the validated subset.
   */
  validateTypes<K extends keyof S & string>(
    payload: Readonly<Record<string, unknown>>,
    keys: readonly K[],
  ): Validated<S, K> {
    this.assertFields(payload, keys);
    return payload;
  }

  private assertFields<K extends keyof S & string>(
    payload: Readonly<Record<string, unknown>>,
    keys: readonly K[],
  ): asserts payload is Readonly<Record<string, unknown>> & Validated<S, K> {
    for (const key of keys) {
      this.validateType(key, payload[key]);
    }
  }
}
