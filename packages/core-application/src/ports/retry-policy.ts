export type RetryContext = {
  attempt: number;
  startedAt: number;
  delayMs: number;
  lastError: unknown;
};

export type RetryPolicy = {
  maxAttempts: number;            // first try included
  initialDelayMs: number;         // ex: 1000
  backoffMultiplier: number;      // ex: 2
  shouldRetry: (err: unknown) => boolean;
};

export type Sleeper = (ms: number) => Promise<void>;
