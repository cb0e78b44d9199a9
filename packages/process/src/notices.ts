/**
 * Outbound notices and the sinks that deliver them.
 *
 * Handlers build notices; `TokenProcess` hands them to a `NoticeSink`
 * only after the action committed. Every numeric tag is a decimal string.
 */

import { once } from "node:events";
import { canonicalize } from "json-canonicalize";
import type { Writable } from "node:stream";
import type { Address, OutboundMessage, Quantity, TokenInfo } from "@ledgerkit/types";
import type { BurnProposal } from "@ledgerkit/governance";
import { formatQuantity } from "@ledgerkit/ledger";

// =============================================================================
// Sinks
// =============================================================================

export interface NoticeSink {
  send(message: OutboundMessage): void;
}

/**
 * Collects notices in memory. Used by tests and the demo.
 */
export class MemoryOutbox implements NoticeSink {
  private readonly _messages: OutboundMessage[] = [];

  send(message: OutboundMessage): void {
    this._messages.push(message);
  }

  get messages(): readonly OutboundMessage[] {
    return [...this._messages];
  }

  /** Notices whose `Action` tag equals `action`. */
  withAction(action: string): readonly OutboundMessage[] {
    return this._messages.filter((message) => message.tags["Action"] === action);
  }

  clear(): void {
    this._messages.length = 0;
  }
}

/**
 * Writes each notice as one JSON line.
 *
 * `send()` never blocks. When the stream signals backpressure,
 * `flushed()` resolves only after the next `drain`.
 */
export class StreamSink implements NoticeSink {
  private readonly output: Writable;
  private pending: Promise<void> | undefined;

  constructor(output: Writable) {
    this.output = output;
  }

  send(message: OutboundMessage): void {
    const ok = this.output.write(`${JSON.stringify(message)}\n`);
    if (!ok && this.pending === undefined) {
      this.pending = once(this.output, "drain").then(() => {
        this.pending = undefined;
      });
    }
  }

  async flushed(): Promise<void> {
    await this.pending;
  }
}

// =============================================================================
// Notice Builders
// =============================================================================

export function creditNotice(
  target: string,
  sender: Address,
  quantity: Quantity,
  recipient?: Address,
): OutboundMessage {
  return {
    target,
    tags: {
      Action: "Credit-Notice",
      Sender: sender,
      Quantity: formatQuantity(quantity),
      ...(recipient !== undefined ? { Recipient: recipient } : {}),
    },
  };
}

export function debitNotice(
  target: Address,
  quantity: Quantity,
  options: { readonly recipient?: Address | undefined; readonly process?: string | undefined } = {},
): OutboundMessage {
  return {
    target,
    tags: {
      Action: "Debit-Notice",
      Quantity: formatQuantity(quantity),
      ...(options.recipient !== undefined ? { Recipient: options.recipient } : {}),
      ...(options.process !== undefined ? { Process: options.process } : {}),
    },
  };
}

/** Sent to each burner when a burn is requested. */
export function burnRequestNotice(approver: Address, proposal: BurnProposal): OutboundMessage {
  return {
    target: approver,
    tags: {
      Action: "Burn-Request-Notice",
      Approver: approver,
      "Burn-Request-Id": proposal.id,
      Requestor: proposal.requestor,
      Quantity: formatQuantity(proposal.quantity),
    },
  };
}

export function mintNotice(
  caller: Address,
  target: Address,
  quantity: Quantity,
  ticker: string,
): OutboundMessage {
  return {
    target: caller,
    tags: {},
    data: `Successfully minted ${formatQuantity(quantity)} ${ticker} to '${target}'`,
  };
}

export function infoNotice(caller: Address, info: TokenInfo): OutboundMessage {
  return {
    target: caller,
    tags: {
      Name: info.name,
      Ticker: info.ticker,
      Logo: info.logo,
      Denomination: info.denomination,
    },
  };
}

export function balanceNotice(
  caller: Address,
  target: Address,
  balance: Quantity,
  ticker: string,
): OutboundMessage {
  return {
    target: caller,
    tags: { Balance: formatQuantity(balance), Target: target, Ticker: ticker },
    data: formatQuantity(balance),
  };
}

export function balancesNotice(
  caller: Address,
  balances: Readonly<Record<Address, string>>,
): OutboundMessage {
  return { target: caller, tags: {}, data: canonicalize(balances) };
}

/**
 * Answer to a failed action: `<Action>-Error`, referencing the message.
 */
export function errorNotice(
  caller: Address,
  action: string,
  messageId: string | undefined,
  error: string,
): OutboundMessage {
  return {
    target: caller,
    tags: {
      Action: `${action}-Error`,
      ...(messageId !== undefined ? { "Message-Id": messageId } : {}),
      Error: error,
    },
  };
}
