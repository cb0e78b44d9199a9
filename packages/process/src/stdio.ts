/**
 * Newline-delimited JSON transport.
 *
 * Each input line is one inbound message. Notices are written by the
 * process's sink; this loop only parses and dispatches.
 */

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import type { Logger } from "pino";
import type { InboundMessage } from "@ledgerkit/types";
import { isInboundMessage } from "@ledgerkit/types";
import { ProcessError } from "./errors.js";
import type { TokenProcess } from "./process.js";

/**
 * @throws ProcessError MALFORMED_MESSAGE
 */
export function parseMessageLine(line: string): InboundMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new ProcessError("MALFORMED_MESSAGE", "Message is not valid JSON");
  }

  if (!isInboundMessage(parsed)) {
    throw new ProcessError(
      "MALFORMED_MESSAGE",
      "Message must have a string `from` and a string-valued `tags` map",
    );
  }
  return parsed;
}

export interface StdioOptions {
  readonly input: Readable;
  readonly process: TokenProcess;
  readonly logger: Logger;

  /** Awaited after each message; reading pauses until it resolves */
  readonly flush?: (() => Promise<void>) | undefined;
}

/**
 * Read messages until `input` ends. Resolves with the number of lines
 * that were dispatched.
 */
export async function runStdio(options: StdioOptions): Promise<number> {
  const lines = createInterface({ input: options.input, crlfDelay: Infinity });
  let dispatched = 0;

  for await (const line of lines) {
    if (line.trim() === "") continue;

    let message: InboundMessage;
    try {
      message = parseMessageLine(line);
    } catch (err) {
      if (!(err instanceof ProcessError)) throw err;
      options.logger.warn({ code: err.code }, err.message);
      continue;
    }

    const result = options.process.handle(message);
    options.logger.debug({ status: result.status }, "Message handled");
    dispatched++;

    if (options.flush !== undefined) {
      await options.flush();
    }
  }

  return dispatched;
}
