/**
 * Tests for quantity conversion and arithmetic.
 *
 * Covers:
 * - toQuantity accepted inputs and rejections
 * - Sub-unit scaling in both directions
 * - Arithmetic helpers
 */

import { describe, it, expect } from "vitest";
import { ValidationError } from "@ledgerkit/validation";
import {
  toQuantity,
  toSubUnits,
  fromSubUnits,
  formatQuantity,
  addQuantity,
  subtractQuantity,
  compareQuantity,
  sumQuantities,
} from "../src/quantity.js";

// ─── toQuantity ──────────────────────────────────────────────────────────

describe("toQuantity", () => {
  it("passes bigints through", () => {
    expect(toQuantity(5n)).toBe(5n);
  });

  it("converts safe integers", () => {
    expect(toQuantity(42)).toBe(42n);
    expect(toQuantity(-7)).toBe(-7n);
  });

  it("converts decimal integer strings beyond 2^53", () => {
    expect(toQuantity("1000000000000000000000")).toBe(1_000_000_000_000_000_000_000n);
  });

  it("trims surrounding whitespace and accepts a sign", () => {
    expect(toQuantity(" 100 ")).toBe(100n);
    expect(toQuantity("+3")).toBe(3n);
    expect(toQuantity("-3")).toBe(-3n);
  });

  it("rejects fractional strings and numbers", () => {
    expect(() => toQuantity("1.5")).toThrow(ValidationError);
    expect(() => toQuantity(1.5)).toThrow(ValidationError);
  });

  it("rejects unsafe numbers", () => {
    expect(() => toQuantity(2 ** 60)).toThrow(ValidationError);
  });

  it("uses the given failure message", () => {
    expect(() => toQuantity("abc", "Could not convert field 'Quantity' to a quantity")).toThrow(
      "Could not convert field 'Quantity' to a quantity",
    );
  });

  it("reports absent values separately", () => {
    try {
      toQuantity(undefined);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.rule).toBe("required");
        expect(error.message).toBe("Cannot convert an absent value to a quantity");
      }
    }
  });

  it("tags conversion failures with the quantity rule", () => {
    try {
      toQuantity("");
      expect.unreachable();
    } catch (error) {
      expect(error instanceof ValidationError && error.rule).toBe("quantity");
    }
  });
});

// ─── Sub-units ───────────────────────────────────────────────────────────

describe("toSubUnits", () => {
  it("scales whole and fractional amounts", () => {
    expect(toSubUnits("1.5", 12)).toBe(1_500_000_000_000n);
    expect(toSubUnits("3", 2)).toBe(300n);
  });

  it("rejects more fractional digits than the denomination", () => {
    expect(() => toSubUnits("0.001", 2)).toThrow(
      'Amount "0.001" has 3 decimal places, but the token allows 2',
    );
  });

  it("rejects malformed input", () => {
    expect(() => toSubUnits("1.", 2)).toThrow(ValidationError);
    expect(() => toSubUnits("-1", 2)).toThrow(ValidationError);
  });
});

describe("fromSubUnits", () => {
  it("renders the smallest unit", () => {
    expect(fromSubUnits(1n, 12)).toBe("0.000000000001");
  });

  it("renders whole amounts with padding", () => {
    expect(fromSubUnits(1_500_000_000_000n, 12)).toBe("1.500000000000");
  });

  it("handles zero denomination and negatives", () => {
    expect(fromSubUnits(42n, 0)).toBe("42");
    expect(fromSubUnits(-25n, 1)).toBe("-2.5");
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("arithmetic", () => {
  it("adds and subtracts", () => {
    expect(addQuantity(2n, 3n)).toBe(5n);
    expect(subtractQuantity(2n, 3n)).toBe(-1n);
  });

  it("compares", () => {
    expect(compareQuantity(1n, 2n)).toBe(-1);
    expect(compareQuantity(2n, 2n)).toBe(0);
    expect(compareQuantity(3n, 2n)).toBe(1);
  });

  it("sums any iterable", () => {
    expect(sumQuantities([1n, 2n, 3n])).toBe(6n);
    expect(sumQuantities(new Map([["a", 4n]]).values())).toBe(4n);
    expect(sumQuantities([])).toBe(0n);
  });

  it("formats as a decimal string", () => {
    expect(formatQuantity(12345678901234567890n)).toBe("12345678901234567890");
  });
});
