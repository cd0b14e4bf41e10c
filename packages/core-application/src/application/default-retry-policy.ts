import type { RetryPolicy } from "../ports/retry-policy";
import { RetryableError } from "./errors";

export type RetrySettings = {
  maxRetries: number;
  retryDelaySeconds: number;
};

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxRetries: 3,
  retryDelaySeconds: 1.0,
};

export function isRetryable(err: unknown): boolean {
  return err instanceof RetryableError;
}

/** `maxRetries` counts the extra attempts after the first one. */
export function retryPolicyFromSettings(settings: RetrySettings = DEFAULT_RETRY_SETTINGS): RetryPolicy {
  return {
    maxAttempts: Math.max(0, settings.maxRetries) + 1,
    initialDelayMs: settings.retryDelaySeconds * 1000,
    backoffMultiplier: 2,
    shouldRetry: isRetryable,
  };
}
