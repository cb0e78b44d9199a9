/**
 * @ledgerkit/types — Shared domain types for the Ledgerkit stack.
 *
 * These types are used across all Ledgerkit packages:
 * - Token primitives (addresses, quantities, metadata)
 * - Balance change results
 * - Inbound and outbound host messages
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Token types
export type {
  Address,
  Quantity,
  QuantityString,
  TokenMetadata,
  TokenInfo,
  BalanceChange,
  TransferResult,
} from "./token.js";

// Message types
export type {
  ActionName,
  InboundMessage,
  OutboundMessage,
} from "./message.js";

// Runtime type guards
export {
  ADDRESS_PATTERN,
  ADDRESS_LENGTH,
  isAddress,
  isQuantityString,
  isTokenMetadata,
  isActionName,
  isInboundMessage,
  isOutboundMessage,
} from "./guards.js";
