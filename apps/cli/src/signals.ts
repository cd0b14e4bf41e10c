import type { CancellationToken, Logger } from "@pairsync/core-application";

export type ShutdownSignal = "SIGINT" | "SIGTERM";

export interface ProcessSignals {
  on(signal: ShutdownSignal, handler: () => void): unknown;
  off(signal: ShutdownSignal, handler: () => void): unknown;
}

const SHUTDOWN_SIGNALS: ShutdownSignal[] = ["SIGINT", "SIGTERM"];

/**
 * First signal cancels the token so the runner stops after the current pair.
 * Returns a function that removes the handlers.
 */
export function bindShutdownSignals(
  token: CancellationToken,
  logger: Logger,
  signals: ProcessSignals = process
): () => void {
  const handlers = SHUTDOWN_SIGNALS.map((signal) => {
    const handler = () => {
      logger.info({ signal }, "Shutdown requested, finishing current pair");
      token.cancel(signal);
    };
    signals.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) signals.off(signal, handler);
  };
}
