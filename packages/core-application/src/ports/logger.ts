import type { Logger as PinoLogger } from "pino";

/**
 * pino's own logger type, data first:
 *   logger.warn({ pair, step }, "Publish failed");
 */
export type Logger = PinoLogger;

export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";
