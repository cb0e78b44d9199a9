/**
 * @ledgerkit/process — Token process.
 *
 * Owns one token ledger, its burn governance and its external-transfer
 * gate, and answers inbound messages:
 *
 *   message → route(Action) → handler → commit → notices
 *
 * Notices are delivered only after the handler returned; a failed
 * action sends nothing but (optionally) an error notice to the caller.
 */

import type { Logger } from "pino";
import type { InboundMessage, OutboundMessage } from "@ledgerkit/types";
import { BurnGovernance } from "@ledgerkit/governance";
import { ExternalTransferGate, Token } from "@ledgerkit/ledger";
import type { ProcessConfig } from "./config.js";
import { parseAddressList, parseBalanceList, parseList } from "./config.js";
import { describeError } from "./errors.js";
import type { ErrorDescriptor } from "./errors.js";
import type { HandlerContext, HandlerResult, Output } from "./handlers.js";
import { errorNotice } from "./notices.js";
import type { NoticeSink } from "./notices.js";
import { toPayload } from "./payload.js";
import { route } from "./router.js";

// =============================================================================
// Types
// =============================================================================

export interface TokenProcessOptions {
  readonly token: Token;
  readonly governance: BurnGovernance;
  readonly gate: ExternalTransferGate;
  readonly sink: NoticeSink;
  readonly logger: Logger;

  /** Answer failed actions with `<Action>-Error` notices. Default: true */
  readonly sendErrorNotices?: boolean | undefined;
}

export type HandleResult =
  | {
      readonly status: "ok";
      readonly action: string;
      readonly output: Output;
      readonly notices: readonly OutboundMessage[];
    }
  | {
      readonly status: "error";
      readonly action: string;
      readonly error: ErrorDescriptor;
    }
  | { readonly status: "unhandled" };

// =============================================================================
// Token Process
// =============================================================================

export class TokenProcess {
  readonly token: Token;
  readonly governance: BurnGovernance;
  readonly gate: ExternalTransferGate;
  private readonly sink: NoticeSink;
  private readonly logger: Logger;
  private readonly sendErrorNotices: boolean;

  constructor(options: TokenProcessOptions) {
    this.token = options.token;
    this.governance = options.governance;
    this.gate = options.gate;
    this.sink = options.sink;
    this.logger = options.logger;
    this.sendErrorNotices = options.sendErrorNotices ?? true;
  }

  /**
   * Answer one message. Never throws for domain errors; they are
   * reported in the result.
   */
  handle(message: InboundMessage): HandleResult {
    const action = message.tags["Action"];
    const handler = route(action);
    if (action === undefined || handler === undefined) {
      this.logger.debug({ action, from: message.from }, "Message not handled");
      return { status: "unhandled" };
    }

    const context: HandlerContext = {
      token: this.token,
      governance: this.governance,
      gate: this.gate,
    };

    let result: HandlerResult;
    try {
      result = handler(context, toPayload(action, message));
    } catch (error) {
      return this.fail(action, message, error);
    }

    if (result.summary !== undefined) {
      this.logger.info({ action, from: message.from }, result.summary);
    }
    this.deliver(result.notices);

    return { status: "ok", action, output: result.output, notices: result.notices };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private fail(action: string, message: InboundMessage, error: unknown): HandleResult {
    const described = describeError(error);

    if (described.kind === "internal") {
      this.logger.error({ action, from: message.from, err: error }, "Unexpected error");
    } else {
      this.logger.warn(
        { action, from: message.from, code: described.code },
        described.message,
      );
    }

    if (this.sendErrorNotices) {
      this.deliver([errorNotice(message.from, action, message.id, described.message)]);
    }

    return { status: "error", action, error: described };
  }

  /**
   * A sink failure does not undo the committed action; it is logged.
   */
  private deliver(notices: readonly OutboundMessage[]): void {
    for (const notice of notices) {
      try {
        this.sink.send(notice);
      } catch (err) {
        this.logger.error(
          { err, target: notice.target, notice: notice.tags["Action"] },
          "Failed to deliver notice",
        );
      }
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface TokenProcessDependencies {
  readonly logger: Logger;
  readonly sink: NoticeSink;
}

/**
 * Build a process from validated configuration.
 *
 * @throws Error if a list variable holds a malformed entry
 */
export function createTokenProcess(
  config: ProcessConfig,
  deps: TokenProcessDependencies,
): TokenProcess {
  const token = new Token();
  token.init(
    {
      name: config.TOKEN_NAME,
      ticker: config.TOKEN_TICKER,
      denomination: config.TOKEN_DENOMINATION,
      ...(config.TOKEN_LOGO !== undefined ? { logo: config.TOKEN_LOGO } : {}),
    },
    parseBalanceList(config.INITIAL_BALANCES),
  );

  const minters = parseAddressList(config.MINTERS, "MINTERS");
  const governance = new BurnGovernance({
    burners: parseAddressList(config.BURNERS, "BURNERS"),
    minters: config.PROCESS_ID !== undefined ? [...minters, config.PROCESS_ID] : minters,
    requiredBurnApprovals: config.REQUIRED_BURN_APPROVALS,
    requiredMintApprovals: config.REQUIRED_MINT_APPROVALS,
    countDuplicateApprovals: config.COUNT_DUPLICATE_APPROVALS,
  });

  const gate = new ExternalTransferGate(
    token,
    parseList(config.AUTHORIZED_EXTERNAL_TARGETS, "AUTHORIZED_EXTERNAL_TARGETS"),
  );

  return new TokenProcess({
    token,
    governance,
    gate,
    sink: deps.sink,
    logger: deps.logger.child({ ticker: config.TOKEN_TICKER }),
    sendErrorNotices: config.SEND_ERROR_NOTICES,
  });
}
