import type { Logger } from "@pairsync/core-application";

import { ConfigError } from "./config/errors";

/** Logs an error that escaped a command. The caller exits with code 1. */
export function reportFatalError(error: unknown, logger: Logger): void {
  if (error instanceof ConfigError) {
    logger.error({ err: error, configPath: error.configPath }, `Configuration error: ${error.message}`);
    return;
  }
  logger.error({ err: error }, "Fatal error");
}
