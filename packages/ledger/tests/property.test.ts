/**
 * Property-Based Tests for @ledgerkit/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence
 * of operations:
 *
 * 1. Conservation: transfers never change total supply; supply moves
 *    only by minted minus burned
 * 2. No balance is ever negative
 * 3. A rejected operation leaves every balance unchanged
 * 4. Snapshot → restore → snapshot is identical
 * 5. Sub-unit conversion roundtrip
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Token } from "../src/token.js";
import { LedgerError } from "../src/types.js";
import { toSubUnits, fromSubUnits, addQuantity, sumQuantities } from "../src/quantity.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ADDRESSES = ["alice", "bob", "carol"].map((name) => name.padEnd(43, "_"));

const arbAddress = fc.constantFrom(...ADDRESSES);

const arbQuantity = fc.bigInt({ min: 1n, max: 1_000_000_000_000_000_000_000n });

type Op =
  | { readonly kind: "mint"; readonly target: string; readonly quantity: bigint }
  | { readonly kind: "burn"; readonly target: string; readonly quantity: bigint }
  | {
      readonly kind: "transfer";
      readonly sender: string;
      readonly recipient: string;
      readonly quantity: bigint;
    };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("mint" as const), target: arbAddress, quantity: arbQuantity }),
  fc.record({ kind: fc.constant("burn" as const), target: arbAddress, quantity: arbQuantity }),
  fc.record({
    kind: fc.constant("transfer" as const),
    sender: arbAddress,
    recipient: arbAddress,
    quantity: arbQuantity,
  }),
);

// =============================================================================
// Helpers
// =============================================================================

function freshToken(): Token {
  const token = new Token();
  token.init({ name: "Property Token", ticker: "PRP", denomination: 12 });
  return token;
}

/**
 * Apply one operation. Returns the supply delta, or undefined when the
 * ledger rejected it.
 */
function apply(token: Token, op: Op): bigint | undefined {
  try {
    switch (op.kind) {
      case "mint":
        token.mint(op.target, op.quantity);
        return op.quantity;
      case "burn":
        token.burn(op.target, op.quantity);
        return -op.quantity;
      case "transfer":
        token.transfer(op.sender, op.recipient, op.quantity);
        return 0n;
    }
  } catch (error) {
    if (error instanceof LedgerError) return undefined;
    throw error;
  }
}

// =============================================================================
// Property: Conservation
// =============================================================================

describe("property: conservation", () => {
  it("total supply equals minted minus burned after any sequence", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { minLength: 1, maxLength: 40 }), (ops) => {
        const token = freshToken();
        let expected = 0n;

        for (const op of ops) {
          const delta = apply(token, op);
          if (delta !== undefined) expected = addQuantity(expected, delta);
        }

        expect(token.totalSupply()).toBe(expected);
        expect(sumQuantities(token.balances().values())).toBe(expected);
      }),
      { numRuns: 200 },
    );
  });

  it("transfers never change total supply", () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(arbAddress, arbAddress, arbQuantity), { maxLength: 30 }),
        (transfers) => {
          const token = freshToken();
          for (const address of ADDRESSES) token.mint(address, 1_000_000n);
          const before = token.totalSupply();

          for (const [sender, recipient, quantity] of transfers) {
            apply(token, { kind: "transfer", sender, recipient, quantity });
          }

          expect(token.totalSupply()).toBe(before);
        },
      ),
      { numRuns: 200 },
    );
  });
});

// =============================================================================
// Property: No Negative Balances / Atomic Rejection
// =============================================================================

describe("property: no negative balances", () => {
  it("every balance stays non-negative", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const token = freshToken();
        for (const op of ops) {
          apply(token, op);
          for (const balance of token.balances().values()) {
            expect(balance >= 0n).toBe(true);
          }
        }
      }),
      { numRuns: 200 },
    );
  });

  it("a rejected operation leaves all balances unchanged", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 30 }), (ops) => {
        const token = freshToken();
        for (const op of ops) {
          const before = token.balances();
          if (apply(token, op) === undefined) {
            expect(token.balances()).toEqual(before);
          }
        }
      }),
      { numRuns: 200 },
    );
  });
});

// =============================================================================
// Property: Snapshot Roundtrip
// =============================================================================

describe("property: snapshot → restore → snapshot is identical", () => {
  it("roundtrip preserves metadata and balances", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 20 }), (ops) => {
        const token = freshToken();
        for (const op of ops) apply(token, op);

        const snap1 = token.snapshot("2026-01-01T00:00:00.000Z");
        const snap2 = Token.fromSnapshot(snap1).snapshot("2026-01-01T00:00:00.000Z");

        expect(snap2).toEqual(snap1);
      }),
      { numRuns: 100 },
    );
  });
});

// =============================================================================
// Property: Sub-unit Roundtrip
// =============================================================================

describe("property: fromSubUnits ↔ toSubUnits roundtrip", () => {
  it("toSubUnits(fromSubUnits(q, d), d) === q for any non-negative q", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 0n, max: 999_999_999_999_999_999n }),
        fc.integer({ min: 0, max: 18 }),
        (quantity, denomination) => {
          expect(toSubUnits(fromSubUnits(quantity, denomination), denomination)).toBe(quantity);
        },
      ),
      { numRuns: 1000 },
    );
  });
});
