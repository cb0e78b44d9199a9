/**
 * @ledgerkit/ledger — Internal types for the token ledger.
 *
 * These extend the shared @ledgerkit/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws before any balance is written
 */

import type {
  Address,
  Quantity,
  QuantityString,
  TokenMetadata,
} from "@ledgerkit/types";

// ─── Initialization ──────────────────────────────────────────────────────

/**
 * Balances a token starts with. Either a map or a plain record keyed
 * by address.
 */
export type InitialBalances =
  | ReadonlyMap<Address, Quantity>
  | Readonly<Record<Address, Quantity>>;

// ─── External Transfers ──────────────────────────────────────────────────

/**
 * Result of a debit-only transfer to a receiver on another process.
 * Only the sender's balance changes here.
 */
export interface ExternalTransferResult {
  readonly sender: Address;
  readonly receiver: Address;
  readonly process: string;
  readonly senderBalanceOld: Quantity;
  readonly senderBalanceNew: Quantity;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ALREADY_INITIALIZED"
  | "NOT_INITIALIZED"
  | "INVALID_SNAPSHOT"
  | "NO_BALANCE"
  | "INSUFFICIENT_BALANCE"
  | "SELF_TRANSFER"
  | "UNAUTHORIZED_TARGET";

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of a token's state.
 * Balances are decimal strings, sorted by address.
 */
export interface TokenSnapshot {
  readonly version: 1;
  readonly metadata: TokenMetadata;
  readonly balances: Readonly<Record<Address, QuantityString>>;
  readonly createdAt: string;
}
