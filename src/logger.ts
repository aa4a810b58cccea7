import pino, { type LoggerOptions } from "pino";
import type { LogLevel } from "./config/configFile";

/**
 * Options shared by the Fastify logger and standalone loggers, so both
 * emit the same JSON lines.
 */
export function loggerOptions(level: LogLevel): LoggerOptions {
  return {
    level,
    base: { app: "order-flow" },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

/** Logger for code that runs outside a request, such as startup. */
export function createLogger(level: LogLevel): pino.Logger {
  return pino(loggerOptions(level));
}
