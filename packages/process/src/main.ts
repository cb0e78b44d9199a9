/**
 * @ledgerkit/process — Entry point.
 *
 * Loads config, builds the token process and answers NDJSON messages
 * from stdin. Notices are written to stdout, logs to stderr.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { StreamSink } from "./notices.js";
import { createTokenProcess } from "./process.js";
import { runStdio } from "./stdio.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  const sink = new StreamSink(process.stdout);
  const tokenProcess = createTokenProcess(config, { logger, sink });

  logger.info(
    {
      ticker: config.TOKEN_TICKER,
      processId: config.PROCESS_ID,
      burners: tokenProcess.governance.getMembers().burners.length,
    },
    "Token process started",
  );

  const dispatched = await runStdio({
    input: process.stdin,
    process: tokenProcess,
    logger,
    flush: () => sink.flushed(),
  });

  logger.info({ dispatched }, "Input closed");
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
