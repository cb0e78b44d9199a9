/**
 * @ledgerkit/process
 *
 * Host adapter: routes inbound messages to the token ledger and its
 * governance, and emits notices.
 */

export { TokenProcess, createTokenProcess } from "./process.js";
export type {
  TokenProcessOptions,
  TokenProcessDependencies,
  HandleResult,
} from "./process.js";

export { HANDLERS } from "./handlers.js";
export type { Handler, HandlerContext, HandlerResult, Output } from "./handlers.js";
export { route } from "./router.js";

export { toPayload, withQuantity, field } from "./payload.js";
export type { Payload } from "./payload.js";

export {
  MemoryOutbox,
  StreamSink,
  creditNotice,
  debitNotice,
  burnRequestNotice,
  mintNotice,
  infoNotice,
  balanceNotice,
  balancesNotice,
  errorNotice,
} from "./notices.js";
export type { NoticeSink } from "./notices.js";

export { ProcessError, describeError } from "./errors.js";
export type { ErrorDescriptor, ErrorKind, ProcessErrorCode } from "./errors.js";

export {
  ConfigSchema,
  loadConfig,
  parseList,
  parseAddressList,
  parseBalanceList,
} from "./config.js";
export type { ProcessConfig } from "./config.js";

export { createLogger } from "./logger.js";
export { parseMessageLine, runStdio } from "./stdio.js";
export type { StdioOptions } from "./stdio.js";
