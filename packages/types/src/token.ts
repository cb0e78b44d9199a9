/**
 * Token Types
 *
 * Core primitives for a fungible-token ledger.
 *
 * Rules:
 * - Quantities are bigint in memory, decimal strings on the wire
 * - Addresses are 43-character base64url-style identifiers
 * - Token metadata is immutable once a ledger is initialized
 */

/**
 * An account/owner identifier.
 * Exactly 43 characters from `[A-Za-z0-9_-]`.
 */
export type Address = string;

/**
 * An arbitrary-precision, non-negative amount of token units.
 * Never a native `number`.
 */
export type Quantity = bigint;

/**
 * A quantity rendered for transport ("1000000000000").
 */
export type QuantityString = string;

/**
 * Token metadata as supplied at initialization.
 */
export interface TokenMetadata {
  /** Human-readable token name */
  readonly name: string;

  /** Ticker symbol (e.g. "TKN") */
  readonly ticker: string;

  /**
   * Number of decimal places used to interpret raw integer balances.
   * Must be a positive integer.
   */
  readonly denomination: number;

  /** Optional logo reference (e.g. a transaction ID or URL) */
  readonly logo?: string | undefined;
}

/**
 * Token metadata as reported by `info()`.
 * Denomination is rendered as a string, logo defaults to "".
 */
export interface TokenInfo {
  readonly name: string;
  readonly ticker: string;
  readonly denomination: string;
  readonly logo: string;
}

/**
 * Balance change for a single address (mint, burn, external debit).
 */
export interface BalanceChange {
  readonly target: Address;
  readonly balanceOld: Quantity;
  readonly balanceNew: Quantity;
}

/**
 * Balance changes for both sides of an internal transfer.
 */
export interface TransferResult {
  readonly sender: Address;
  readonly recipient: Address;
  readonly senderBalanceOld: Quantity;
  readonly senderBalanceNew: Quantity;
  readonly recipientBalanceOld: Quantity;
  readonly recipientBalanceNew: Quantity;
}
