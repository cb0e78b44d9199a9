/**
 * Tests for the shared ledger field rules and Validator.
 */

import { describe, it, expect } from "vitest";
import {
  addressType,
  quantityType,
  balanceType,
  nonEmptyStringType,
  oneOfType,
} from "../src/rules.js";
import { Validator } from "../src/validator.js";
import { ValidationError } from "../src/errors.js";

const ALICE = "alice".padEnd(43, "_");

// ─── addressType ─────────────────────────────────────────────────────────

describe("addressType", () => {
  const type = addressType("Cannot mint tokens.", "Target address");

  it("accepts a valid address", () => {
    expect(type.assert(ALICE)).toBe(ALICE);
  });

  it("rejects non-strings", () => {
    expect(() => type.assert(42)).toThrow("Cannot mint tokens. Target address must be a string.");
  });

  it("rejects the wrong length", () => {
    expect(() => type.assert("short")).toThrow(
      "Cannot mint tokens. Target address must be 43 characters.",
    );
  });

  it("rejects invalid characters", () => {
    expect(() => type.assert(`${ALICE.slice(1)}!`)).toThrow(
      "Cannot mint tokens. Target address has invalid characters.",
    );
  });

  it("is named after the field", () => {
    expect(type.name).toBe("Target address");
  });
});

// ─── quantityType ────────────────────────────────────────────────────────

describe("quantityType", () => {
  const type = quantityType("Cannot burn tokens.", "Quantity");

  it("accepts positive bigints", () => {
    expect(type.assert(1n)).toBe(1n);
  });

  it("rejects zero and negatives", () => {
    expect(() => type.assert(0n)).toThrow("Cannot burn tokens. Quantity must be greater than 0.");
    expect(() => type.assert(-5n)).toThrow("Cannot burn tokens. Quantity must be greater than 0.");
  });

  it("rejects numbers", () => {
    expect(() => type.assert(5)).toThrow("Cannot burn tokens. Quantity must be an integer.");
  });
});

describe("balanceType", () => {
  it("accepts zero and rejects negatives", () => {
    const type = balanceType("Cannot init token.", "Balance");
    expect(type.check(0n)).toBe(true);
    expect(() => type.assert(-1n)).toThrow("Cannot init token. Balance must not be negative.");
  });
});

describe("nonEmptyStringType", () => {
  it("rejects the empty string", () => {
    const type = nonEmptyStringType("Cannot transfer.", "Process");
    expect(type.check("p")).toBe(true);
    expect(() => type.assert("")).toThrow("Cannot transfer. Process must not be empty.");
  });
});

describe("oneOfType", () => {
  const type = oneOfType("Action-Type", ["NEW_REQUEST", "APPROVAL"] as const);

  it("accepts allowed values", () => {
    expect(type.assert("APPROVAL")).toBe("APPROVAL");
  });

  it("lists the allowed values in the message", () => {
    expect(() => type.assert("VETO")).toThrow(
      "Field 'Action-Type' is invalid. Value provided: VETO. " +
        "Value must be one of the following: NEW_REQUEST, APPROVAL.",
    );
  });
});

// ─── Validator ───────────────────────────────────────────────────────────

describe("Validator", () => {
  const validator = new Validator({
    target: addressType("Cannot mint tokens.", "Target address"),
    quantity: quantityType("Cannot mint tokens.", "Quantity"),
  });

  it("validateType chains", () => {
    expect(validator.validateType("target", ALICE).validateType("quantity", 2n)).toBe(validator);
  });

  it("validateTypes returns the typed subset", () => {
    const payload: Record<string, unknown> = { target: ALICE, quantity: 3n, extra: "x" };
    const validated = validator.validateTypes(payload, ["target", "quantity"]);
    const quantity: bigint = validated.quantity;
    expect(quantity).toBe(3n);
    expect(validated.target).toBe(ALICE);
  });

  it("stops at the first invalid field", () => {
    expect(() => validator.validateTypes({ target: "x", quantity: "nope" }, ["target", "quantity"]))
      .toThrow("Cannot mint tokens. Target address must be 43 characters.");
  });

  it("checks only the listed keys", () => {
    expect(() => validator.validateTypes({ quantity: 1n }, ["quantity"])).not.toThrow();
  });

  it("throws ValidationError", () => {
    expect(() => validator.validateType("quantity", 0n)).toThrow(ValidationError);
  });
});
