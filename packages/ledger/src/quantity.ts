/**
 * @ledgerkit/ledger — Arbitrary-precision quantity arithmetic.
 *
 * Every balance is a bigint. Values arriving from the outside
 * (message tags, config, JSON) are converted once, at the boundary,
 * and never touch floating point afterwards.
 *
 * Rules:
 * - No floating-point operations
 * - Conversion failures throw ValidationError
 * - Sub-unit scaling is exact; excess fractional digits are rejected
 */

import type { Quantity } from "@ledgerkit/types";
import { ValidationError } from "@ledgerkit/validation";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

// ─── Conversion ──────────────────────────────────────────────────────────

/**
 * Convert a raw value into a Quantity.
 *
 * Accepts a bigint, a safe-integer number, or a decimal integer string
 * ("42", "-7", " 100 "). Anything else is rejected with `failureMessage`.
 *
 * 42 → 42n
 * "1000000000000000000000" → 1000000000000000000000n
 * "1.5" → throws
 */
export function toQuantity(
  value: unknown,
  failureMessage = "Could not convert value to a quantity",
): Quantity {
  if (value === undefined || value === null) {
    throw new ValidationError("required", "Cannot convert an absent value to a quantity");
  }

  if (typeof value === "bigint") {
    return value;
  }

  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (INTEGER_PATTERN.test(trimmed)) {
      return BigInt(trimmed);
    }
  }

  throw new ValidationError("quantity", failureMessage);
}

/**
 * Scale a main-unit decimal string by 10^denomination.
 *
 * "1.5" with denomination=12 → 1500000000000n
 * "3" with denomination=2 → 300n
 */
export function toSubUnits(amount: string, denomination: number): Quantity {
  const trimmed = amount.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new ValidationError("quantity", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > denomination) {
    throw new ValidationError(
      "quantity",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(denomination)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(denomination, "0"));
}

/**
 * Render sub-units as a main-unit decimal string.
 *
 * 1n with denomination=12 → "0.000000000001"
 * 1500000000000n with denomination=12 → "1.500000000000"
 */
export function fromSubUnits(quantity: Quantity, denomination: number): string {
  if (denomination === 0) {
    return quantity.toString();
  }

  const negative = quantity < 0n;
  const abs = negative ? -quantity : quantity;
  const str = abs.toString().padStart(denomination + 1, "0");
  const result = `${str.slice(0, str.length - denomination)}.${str.slice(str.length - denomination)}`;

  return negative ? `-${result}` : result;
}

/**
 * Decimal string form used on the wire.
 */
export function formatQuantity(quantity: Quantity): string {
  return quantity.toString();
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function addQuantity(a: Quantity, b: Quantity): Quantity {
  return a + b;
}

export function subtractQuantity(a: Quantity, b: Quantity): Quantity {
  return a - b;
}

/**
 * Compare two quantities. Returns -1, 0, or 1.
 */
export function compareQuantity(a: Quantity, b: Quantity): -1 | 0 | 1 {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sumQuantities(quantities: Iterable<Quantity>): Quantity {
  let total = 0n;
  for (const quantity of quantities) {
    total += quantity;
  }
  return total;
}
