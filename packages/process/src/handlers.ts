/**
 * Action handlers.
 *
 * Each handler validates its payload, performs at most one committed
 * mutation and returns the output plus the notices to send. Handlers
 * never deliver notices themselves.
 */

import type { ActionName, Address, OutboundMessage, Quantity } from "@ledgerkit/types";
import { formatQuantity } from "@ledgerkit/ledger";
import type { BurnGovernance } from "@ledgerkit/governance";
import type { ExternalTransferGate, Token } from "@ledgerkit/ledger";
import {
  Validator,
  addressType,
  nonEmptyStringType,
  oneOfType,
  quantityType,
} from "@ledgerkit/validation";
import {
  balanceNotice,
  balancesNotice,
  burnRequestNotice,
  creditNotice,
  debitNotice,
  infoNotice,
  mintNotice,
} from "./notices.js";
import { field, withQuantity } from "./payload.js";
import type { Payload } from "./payload.js";

// =============================================================================
// Types
// =============================================================================

export interface HandlerContext {
  readonly token: Token;
  readonly governance: BurnGovernance;
  readonly gate: ExternalTransferGate;
}

/** Handler output. Keys sorted, values decimal strings. */
export type Output = Readonly<Record<string, string>>;

export interface HandlerResult {
  readonly output: Output;
  readonly notices: readonly OutboundMessage[];

  /** Log line for a committed mutation */
  readonly summary?: string | undefined;
}

export type Handler = (ctx: HandlerContext, payload: Payload) => HandlerResult;

// ─── Inputs ──────────────────────────────────────────────────────────────

const balanceInput = new Validator({
  Target: addressType("Cannot get token balance.", "Target address"),
});

const mintInput = new Validator({
  Target: addressType("Cannot mint tokens.", "Target address"),
  Quantity: quantityType("Cannot mint tokens.", "Quantity"),
});

const burnActionType = oneOfType("Action-Type", ["NEW_REQUEST", "APPROVAL"]);

const burnRequestInput = new Validator({
  Requestor: addressType("Cannot add burn request.", "Requestor address"),
  Quantity: quantityType("Cannot add burn request.", "Quantity"),
});

const burnApprovalInput = new Validator({
  Requestor: addressType("Cannot approve burn request.", "Requestor address"),
  "Burn-Request-Id": nonEmptyStringType("Cannot approve burn request.", "Burn-Request-Id"),
});

const transferActionType = oneOfType("Action-Type", ["INTERNAL", "EXTERNAL"]);

const transferInput = new Validator({
  Recipient: addressType("Cannot transfer tokens.", "Recipient address"),
  Quantity: quantityType("Cannot transfer tokens.", "Quantity"),
});

const externalTransferInput = new Validator({
  Process: nonEmptyStringType("Cannot process external transfer.", "Process"),
  Recipient: addressType("Cannot process external transfer.", "Recipient address"),
  Quantity: quantityType("Cannot process external transfer.", "Quantity"),
});

function sorted(record: Record<string, string>): Output {
  return Object.fromEntries(
    Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

function amount(token: Token, quantity: Quantity): string {
  return `${formatQuantity(quantity)} ${token.ticker}`;
}

// =============================================================================
// Queries
// =============================================================================

function info(ctx: HandlerContext, payload: Payload): HandlerResult {
  const result = ctx.token.info();
  return {
    output: sorted({
      Name: result.name,
      Ticker: result.ticker,
      Denomination: result.denomination,
      Logo: result.logo,
    }),
    notices: [infoNotice(payload.caller, result)],
  };
}

function balance(ctx: HandlerContext, payload: Payload): HandlerResult {
  const { Target: target } = balanceInput.validateTypes(
    { Target: field(payload, "Target", payload.caller) },
    ["Target"],
  );
  const current = ctx.token.balance(target) ?? 0n;
  const ticker = ctx.token.ticker;

  return {
    output: sorted({ Target: target, Balance: formatQuantity(current), Ticker: ticker }),
    notices: [balanceNotice(payload.caller, target, current, ticker)],
  };
}

function balances(ctx: HandlerContext, payload: Payload): HandlerResult {
  const all: Record<Address, string> = {};
  for (const [address, quantity] of ctx.token.balances()) {
    all[address] = formatQuantity(quantity);
  }
  return { output: all, notices: [balancesNotice(payload.caller, all)] };
}

// =============================================================================
// Mint
// =============================================================================

function mint(ctx: HandlerContext, payload: Payload): HandlerResult {
  ctx.governance.canMint(payload.caller);
  const { Target: target, Quantity: quantity } = mintInput.validateTypes(withQuantity(payload), [
    "Target",
    "Quantity",
  ]);

  const change = ctx.token.mint(target, quantity);

  return {
    output: sorted({
      balance_new: formatQuantity(change.balanceNew),
      balance_old: formatQuantity(change.balanceOld),
      target,
    }),
    notices: [mintNotice(payload.caller, target, quantity, ctx.token.ticker)],
    summary: `Minted ${amount(ctx.token, quantity)} to '${target}'`,
  };
}

// =============================================================================
// Burn
// =============================================================================

function burn(ctx: HandlerContext, payload: Payload): HandlerResult {
  const actionType = burnActionType.assert(field(payload, "Action-Type", "NEW_REQUEST"));
  return actionType === "APPROVAL" ? approveBurn(ctx, payload) : requestBurn(ctx, payload);
}

function requestBurn(ctx: HandlerContext, payload: Payload): HandlerResult {
  const { Requestor: requestor, Quantity: quantity } = burnRequestInput.validateTypes(
    { ...withQuantity(payload), Requestor: field(payload, "Requestor", payload.caller) },
    ["Requestor", "Quantity"],
  );

  const proposal = ctx.governance.createBurnRequest(requestor, quantity);

  return {
    output: sorted({
      burn_request_id: proposal.id,
      quantity: formatQuantity(quantity),
      requestor,
    }),
    notices: ctx.governance
      .getMembers()
      .burners.map((burner) => burnRequestNotice(burner, proposal)),
    summary: `Burn of ${amount(ctx.token, quantity)} requested for '${requestor}' (${proposal.id})`,
  };
}

/**
 * The approval that reaches quorum burns in the same step. The balance
 * check runs before the approval is recorded, so an insufficient
 * balance leaves the proposal pending.
 */
function approveBurn(ctx: HandlerContext, payload: Payload): HandlerResult {
  const { Requestor: requestor, "Burn-Request-Id": id } = burnApprovalInput.validateTypes(
    payload.fields,
    ["Requestor", "Burn-Request-Id"],
  );

  const { proposal, quorumReached } = ctx.governance.approveBurnRequest(
    payload.caller,
    requestor,
    id,
    { beforeQuorum: (approved) => ctx.token.assertCanBurn(approved.requestor, approved.quantity) },
  );

  if (!quorumReached) {
    return {
      output: sorted({
        approvals: String(proposal.approvals.length),
        approved: "false",
        burn_request_id: id,
        required_approvals: String(ctx.governance.getRequirements().requiredBurnApprovals),
      }),
      notices: [],
      summary: `Burn request '${id}' approved by '${payload.caller}'`,
    };
  }

  const change = ctx.token.burn(requestor, proposal.quantity);

  return {
    output: sorted({
      balance_new: formatQuantity(change.balanceNew),
      balance_old: formatQuantity(change.balanceOld),
      target: requestor,
    }),
    notices: [debitNotice(requestor, proposal.quantity)],
    summary: `Burned ${amount(ctx.token, proposal.quantity)} from address '${requestor}'`,
  };
}

// =============================================================================
// Transfer
// =============================================================================

function transfer(ctx: HandlerContext, payload: Payload): HandlerResult {
  const actionType = transferActionType.assert(field(payload, "Action-Type", "INTERNAL"));
  return actionType === "EXTERNAL"
    ? transferExternal(ctx, payload)
    : transferInternal(ctx, payload);
}

function transferInternal(ctx: HandlerContext, payload: Payload): HandlerResult {
  const { Recipient: recipient, Quantity: quantity } = transferInput.validateTypes(
    withQuantity(payload),
    ["Recipient", "Quantity"],
  );
  const sender = payload.caller;

  const result = ctx.token.transfer(sender, recipient, quantity);

  return {
    output: sorted({
      recipient_balance_new: formatQuantity(result.recipientBalanceNew),
      recipient_balance_old: formatQuantity(result.recipientBalanceOld),
      sender_balance_new: formatQuantity(result.senderBalanceNew),
      sender_balance_old: formatQuantity(result.senderBalanceOld),
    }),
    notices: [
      debitNotice(sender, quantity, { recipient }),
      creditNotice(recipient, sender, quantity),
    ],
    summary: `Transferred ${amount(ctx.token, quantity)} from '${sender}' to receiver '${recipient}'`,
  };
}

function transferExternal(ctx: HandlerContext, payload: Payload): HandlerResult {
  const {
    Process: process,
    Recipient: recipient,
    Quantity: quantity,
  } = externalTransferInput.validateTypes(withQuantity(payload), [
    "Process",
    "Recipient",
    "Quantity",
  ]);
  const sender = payload.caller;

  const result = ctx.gate.transferExternally(sender, recipient, process, quantity);

  return {
    output: sorted({
      process,
      recipient,
      sender_balance_new: formatQuantity(result.senderBalanceNew),
      sender_balance_old: formatQuantity(result.senderBalanceOld),
    }),
    notices: [
      debitNotice(sender, quantity, { recipient, process }),
      creditNotice(process, sender, quantity, recipient),
    ],
    summary: `Transferred ${amount(ctx.token, quantity)} from '${sender}' to process '${process}' and receiver '${recipient}'`,
  };
}

// =============================================================================
// Registry
// =============================================================================

export const HANDLERS: Readonly<Record<ActionName, Handler>> = {
  Info: info,
  Balance: balance,
  Balances: balances,
  Mint: mint,
  Burn: burn,
  Transfer: transfer,
};
