export class PairSyncError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "PairSyncError";
  }
}

/** The same step may succeed if attempted again. */
export class RetryableError extends PairSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RetryableError";
  }
}

/** The step failed for this pair until its inputs change or the next cycle. */
export class TerminalError extends PairSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TerminalError";
  }
}

export class RetryExhaustedError extends TerminalError {
  constructor(message: string, public attempts: number, cause?: unknown) {
    super(message, cause);
    this.name = "RetryExhaustedError";
  }
}

const TRANSIENT_IO_CODES = new Set([
  "EACCES",
  "EAGAIN",
  "EBUSY",
  "EIO",
  "EMFILE",
  "ENFILE",
  "ENOENT",
  "EPERM",
  "ETIMEDOUT",
]);

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function isTransientIoError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && TRANSIENT_IO_CODES.has(code);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
