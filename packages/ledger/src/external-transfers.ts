/**
 * @ledgerkit/ledger — External-transfer gate.
 *
 * Tokens may leave this ledger only towards processes on an allow-list.
 * An external transfer debits the sender here; the receiver is credited
 * by the target process when it handles the outbound notice.
 */

import type { Address, Quantity } from "@ledgerkit/types";
import {
  Validator,
  addressType,
  nonEmptyStringType,
} from "@ledgerkit/validation";
import type { Token } from "./token.js";
import type { ExternalTransferResult } from "./types.js";
import { LedgerError } from "./types.js";

const CONTEXT = "Cannot process external transfer.";

const targetInput = nonEmptyStringType("Cannot update external targets.", "Target");

const transferInput = new Validator({
  process: nonEmptyStringType(CONTEXT, "Process"),
  receiver: addressType(CONTEXT, "Receiver address"),
});

export class ExternalTransferGate {
  private readonly _token: Token;
  private readonly _targets: Set<string> = new Set();

  constructor(token: Token, targets: Iterable<string> = []) {
    this._token = token;
    this.addTargets([...targets]);
  }

  // ─── Allow-list ──────────────────────────────────────────────────────

  /** Allow transfers to each process in `targets`. Already-allowed entries are ignored. */
  addTargets(targets: readonly string[]): void {
    for (const target of targets) targetInput.assert(target);
    for (const target of targets) this._targets.add(target);
  }

  /** Disallow each process in `targets`. Unknown entries are ignored. */
  removeTargets(targets: readonly string[]): void {
    for (const target of targets) targetInput.assert(target);
    for (const target of targets) this._targets.delete(target);
  }

  isAuthorized(process: string): boolean {
    return this._targets.has(process);
  }

  /** Allowed processes, sorted. */
  targets(): readonly string[] {
    return [...this._targets].sort();
  }

  // ─── Transfer ────────────────────────────────────────────────────────

  /**
   * Debit `sender` by `quantity` for delivery to `receiver` on `process`.
   *
   * Throws:
   * - LedgerError UNAUTHORIZED_TARGET if `process` is not allowed
   * - ValidationError for malformed addresses, process or quantity
   * - LedgerError NO_BALANCE / INSUFFICIENT_BALANCE from the sender's debit
   */
  transferExternally(
    sender: Address,
    receiver: Address,
    process: string,
    quantity: Quantity,
  ): ExternalTransferResult {
    if (!this.isAuthorized(process)) {
      throw new LedgerError(
        "UNAUTHORIZED_TARGET",
        `${CONTEXT} Process '${process}' is not authorized to receive transfers.`,
      );
    }

    transferInput.validateTypes({ process, receiver }, ["process", "receiver"]);
    const debit = this._token.transferOut(sender, quantity);

    return {
      sender,
      receiver,
      process,
      senderBalanceOld: debit.balanceOld,
      senderBalanceNew: debit.balanceNew,
    };
  }
}
