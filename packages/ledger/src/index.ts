/**
 * @ledgerkit/ledger — Token ledger engine.
 *
 * Balances are arbitrary-precision integers. Every mutation is
 * validated in full before anything is written.
 *
 * @packageDocumentation
 */

// Core token
export { Token } from "./token.js";

// External transfers
export { ExternalTransferGate } from "./external-transfers.js";

// Quantity arithmetic
export {
  toQuantity,
  toSubUnits,
  fromSubUnits,
  formatQuantity,
  addQuantity,
  subtractQuantity,
  compareQuantity,
  sumQuantities,
} from "./quantity.js";

// Types
export type {
  InitialBalances,
  ExternalTransferResult,
  LedgerErrorCode,
  TokenSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
