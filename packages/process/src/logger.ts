import pino from "pino";
import type { Logger } from "pino";
import type { ProcessConfig } from "./config.js";

/**
 * Logs go to stderr; stdout carries only outbound notices.
 */
export function createLogger(config: Pick<ProcessConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}
