/**
 * Message Types
 *
 * The shape of messages exchanged with the host actor runtime.
 * Tags are a flat string → string map; every numeric field travels
 * as a decimal string.
 */

/**
 * Actions a token process answers to.
 */
export type ActionName =
  | "Info"
  | "Balance"
  | "Balances"
  | "Mint"
  | "Burn"
  | "Transfer";

/**
 * A message delivered to the process by the host runtime.
 */
export interface InboundMessage {
  /** Host-assigned message ID */
  readonly id?: string | undefined;

  /** Address of the sender (the caller) */
  readonly from: string;

  /** Flat tag map; `Action` selects the handler */
  readonly tags: Readonly<Record<string, string>>;

  /** Optional message body */
  readonly data?: string | undefined;
}

/**
 * A message the process asks the host runtime to deliver.
 */
export interface OutboundMessage {
  /** Recipient address or process ID */
  readonly target: string;

  readonly tags: Readonly<Record<string, string>>;

  readonly data?: string | undefined;
}
