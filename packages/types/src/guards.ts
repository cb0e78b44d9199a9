/**
 * Runtime Type Guards
 *
 * Narrowing functions for token domain types.
 * These enable safe runtime checks at system boundaries
 * (inbound messages, snapshots, configuration).
 */

import type { Address, TokenMetadata } from "./token.js";
import type { ActionName, InboundMessage, OutboundMessage } from "./message.js";

// =============================================================================
// Token guards
// =============================================================================

/** Character class and length of a valid address. */
export const ADDRESS_PATTERN = /^[A-Za-z0-9_-]+$/;
export const ADDRESS_LENGTH = 43;

export function isAddress(value: unknown): value is Address {
  return (
    typeof value === "string" &&
    value.length === ADDRESS_LENGTH &&
    ADDRESS_PATTERN.test(value)
  );
}

/**
 * A non-negative decimal integer string ("0", "1000").
 */
export function isQuantityString(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

export function isTokenMetadata(value: unknown): value is TokenMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.name === "string" &&
    typeof v.ticker === "string" &&
    typeof v.denomination === "number" &&
    Number.isInteger(v.denomination) &&
    v.denomination > 0 &&
    (v.logo === undefined || typeof v.logo === "string")
  );
}

// =============================================================================
// Message guards
// =============================================================================

const ACTION_NAMES = new Set<string>([
  "Info", "Balance", "Balances", "Mint", "Burn", "Transfer",
]);

export function isActionName(value: unknown): value is ActionName {
  return typeof value === "string" && ACTION_NAMES.has(value);
}

function isTagMap(value: unknown): value is Record<string, string> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === "string");
}

export function isInboundMessage(value: unknown): value is InboundMessage {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.from === "string" &&
    isTagMap(v.tags) &&
    (v.id === undefined || typeof v.id === "string") &&
    (v.data === undefined || typeof v.data === "string")
  );
}

export function isOutboundMessage(value: unknown): value is OutboundMessage {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.target === "string" &&
    isTagMap(v.tags) &&
    (v.data === undefined || typeof v.data === "string")
  );
}
