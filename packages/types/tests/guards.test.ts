/**
 * Runtime type guard tests for @ledgerkit/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isQuantityString,
  isTokenMetadata,
  isActionName,
  isInboundMessage,
  isOutboundMessage,
} from "../src/guards.js";

const ALICE = "alice".padEnd(43, "_");

// =============================================================================
// Token guards
// =============================================================================

describe("isAddress", () => {
  it("accepts a 43-character address", () => {
    expect(isAddress(ALICE)).toBe(true);
    expect(isAddress("0123456789abcdefghijklmnopqrstuvwxyzABCDEF-")).toBe(true);
  });

  it("rejects wrong length", () => {
    expect(isAddress(ALICE.slice(1))).toBe(false);
    expect(isAddress(`${ALICE}x`)).toBe(false);
  });

  it("rejects characters outside the charset", () => {
    expect(isAddress(`${ALICE.slice(1)}!`)).toBe(false);
    expect(isAddress(`${ALICE.slice(1)} `)).toBe(false);
    expect(isAddress(`${ALICE.slice(1)}=`)).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAddress(undefined)).toBe(false);
    expect(isAddress(43)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("isQuantityString", () => {
  it("accepts non-negative integer strings", () => {
    expect(isQuantityString("0")).toBe(true);
    expect(isQuantityString("1000000000000000000000")).toBe(true);
  });

  it("rejects signs, fractions and numbers", () => {
    expect(isQuantityString("-1")).toBe(false);
    expect(isQuantityString("1.5")).toBe(false);
    expect(isQuantityString("")).toBe(false);
    expect(isQuantityString(10)).toBe(false);
  });
});

describe("isTokenMetadata", () => {
  it("accepts metadata with and without logo", () => {
    expect(isTokenMetadata({ name: "Test", ticker: "TST", denomination: 12 })).toBe(true);
    expect(isTokenMetadata({ name: "Test", ticker: "TST", denomination: 1, logo: "logo-id" })).toBe(true);
  });

  it("rejects zero or fractional denomination", () => {
    expect(isTokenMetadata({ name: "Test", ticker: "TST", denomination: 0 })).toBe(false);
    expect(isTokenMetadata({ name: "Test", ticker: "TST", denomination: 1.5 })).toBe(false);
  });

  it("rejects non-string name or logo", () => {
    expect(isTokenMetadata({ name: 1, ticker: "TST", denomination: 12 })).toBe(false);
    expect(isTokenMetadata({ name: "Test", ticker: "TST", denomination: 12, logo: 5 })).toBe(false);
    expect(isTokenMetadata(null)).toBe(false);
  });
});

// =============================================================================
// Message guards
// =============================================================================

describe("isActionName", () => {
  it("accepts known actions", () => {
    for (const action of ["Info", "Balance", "Balances", "Mint", "Burn", "Transfer"]) {
      expect(isActionName(action)).toBe(true);
    }
  });

  it("rejects unknown or differently cased actions", () => {
    expect(isActionName("Reset")).toBe(false);
    expect(isActionName("mint")).toBe(false);
  });
});

describe("isInboundMessage", () => {
  it("accepts a minimal message", () => {
    expect(isInboundMessage({ from: ALICE, tags: { Action: "Info" } })).toBe(true);
  });

  it("accepts id and data", () => {
    expect(isInboundMessage({ id: "m-1", from: ALICE, tags: {}, data: "x" })).toBe(true);
  });

  it("rejects numeric tag values", () => {
    expect(isInboundMessage({ from: ALICE, tags: { Quantity: 5 } })).toBe(false);
  });

  it("rejects array tags and missing from", () => {
    expect(isInboundMessage({ from: ALICE, tags: [] })).toBe(false);
    expect(isInboundMessage({ tags: {} })).toBe(false);
  });
});

describe("isOutboundMessage", () => {
  it("accepts a notice", () => {
    expect(
      isOutboundMessage({ target: ALICE, tags: { Action: "Credit-Notice", Quantity: "1" } }),
    ).toBe(true);
  });

  it("rejects non-string data", () => {
    expect(isOutboundMessage({ target: ALICE, tags: {}, data: 1 })).toBe(false);
  });
});
