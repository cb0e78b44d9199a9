/**
 * Shared field rules for ledger inputs.
 *
 * `context` prefixes every message with the operation that rejected the
 * value, e.g. `addressType("Cannot mint tokens.", "Target address")`
 * yields "Cannot mint tokens. Target address must be 43 characters."
 */

import { ADDRESS_LENGTH, ADDRESS_PATTERN } from "@ledgerkit/types";
import { Type } from "./type.js";

/** String, exactly 43 characters, drawn from `[A-Za-z0-9_-]`. */
export function addressType(context: string, field: string): Type<string> {
  return Type.string(`${context} ${field} must be a string.`)
    .length(ADDRESS_LENGTH, undefined, `${context} ${field} must be ${ADDRESS_LENGTH} characters.`)
    .match(ADDRESS_PATTERN, `${context} ${field} has invalid characters.`)
    .setName(field);
}

/** Arbitrary-precision integer, strictly greater than zero. */
export function quantityType(context: string, field: string): Type<bigint> {
  return Type.bigint(`${context} ${field} must be an integer.`)
    .greaterThan(0n, `${context} ${field} must be greater than 0.`)
    .setName(field);
}

/** Non-negative arbitrary-precision integer. Used for initial balances. */
export function balanceType(context: string, field: string): Type<bigint> {
  return Type.bigint(`${context} ${field} must be an integer.`)
    .custom(`${context} ${field} must not be negative.`, (value) => value >= 0n)
    .setName(field);
}

/** Non-empty string, e.g. a process identifier. */
export function nonEmptyStringType(context: string, field: string): Type<string> {
  return Type.string(`${context} ${field} must be a string.`)
    .length(0, "greater", `${context} ${field} must not be empty.`)
    .setName(field);
}

/**
 * One of a fixed set of string values.
 *
 * "Field 'Action-Type' is invalid. Value provided: X. Value must be one
 * of the following: A, B."
 */
export function oneOfType<V extends string>(field: string, allowed: readonly V[]): Type<V> {
  return Type.either(
    allowed.map((value) => Type.is(value)),
    (value) =>
      `Field '${field}' is invalid. Value provided: ${String(value)}. ` +
      `Value must be one of the following: ${allowed.join(", ")}.`,
  ).setName(field);
}
