type CancelListener = (reason: string) => void;

/**
 * Shutdown flag handed to the runner. Checked at the start of every cycle and
 * between pairs; a pair that is already running is allowed to finish.
 */
export class CancellationToken {
  private cancelReason: string | null = null;
  private readonly listeners = new Set<CancelListener>();

  get isCancelled(): boolean {
    return this.cancelReason !== null;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  cancel(reason = "cancelled"): void {
    if (this.cancelReason !== null) return;
    this.cancelReason = reason;
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) listener(reason);
  }

  /** Returns an unsubscribe function. Fires immediately if already cancelled. */
  onCancel(listener: CancelListener): () => void {
    if (this.cancelReason !== null) {
      listener(this.cancelReason);
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
