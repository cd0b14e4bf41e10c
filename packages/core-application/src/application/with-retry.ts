import type { RetryContext, RetryPolicy, Sleeper } from "../ports/retry-policy";
import { RetryExhaustedError, errorMessage } from "./errors";

/**
 * Runs `operation` until it succeeds, fails with an error the policy does not
 * retry, or runs out of attempts. The delay starts at `initialDelayMs` and is
 * multiplied by `backoffMultiplier` after every retryable failure.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  sleep: Sleeper,
  onRetry?: (ctx: RetryContext) => void
): Promise<T> {
  const startedAt = Date.now();
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let delayMs = policy.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (!policy.shouldRetry(err)) throw err;

      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(
          `Operation failed after ${attempt} attempts: ${errorMessage(err)}`,
          attempt,
          err
        );
      }

      onRetry?.({ attempt, startedAt, delayMs, lastError: err });
      await sleep(delayMs);
      delayMs *= policy.backoffMultiplier;
    }
  }
}
