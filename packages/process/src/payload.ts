/**
 * Inbound message → handler payload.
 *
 * Tags are copied into a flat field map and the caller is exposed as
 * `Caller`. Handlers that take a quantity read it through
 * `withQuantity()`; other actions ignore a `Quantity` tag.
 */

import type { Address, InboundMessage } from "@ledgerkit/types";
import { toQuantity } from "@ledgerkit/ledger";

export interface Payload {
  readonly action: string;

  /** Address that sent the message */
  readonly caller: Address;

  readonly messageId: string | undefined;

  /** Tags plus `Caller`, as strings */
  readonly fields: Readonly<Record<string, unknown>>;

  readonly data: string | undefined;
}

export function toPayload(action: string, message: InboundMessage): Payload {
  return {
    action,
    caller: message.from,
    messageId: message.id,
    fields: { ...message.tags, Caller: message.from },
    data: message.data,
  };
}

/**
 * The payload fields with `Quantity` converted to a bigint.
 * An absent `Quantity` stays undefined for the handler's own check.
 *
 * @throws ValidationError if the `Quantity` tag is not an integer
 */
export function withQuantity(payload: Payload): Readonly<Record<string, unknown>> {
  const raw = payload.fields["Quantity"];
  if (raw === undefined) {
    return payload.fields;
  }
  return {
    ...payload.fields,
    Quantity: toQuantity(raw, "Could not convert field 'Quantity' to a quantity"),
  };
}

/**
 * A field value, or `fallback` when the tag is absent.
 */
export function field(payload: Payload, name: string, fallback?: string): unknown {
  return payload.fields[name] ?? fallback;
}
