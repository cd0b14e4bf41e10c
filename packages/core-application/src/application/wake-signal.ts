type WakeListener = () => void;

/**
 * Lets file events cut the idle wait between cycles short. A notify that
 * arrives while nobody is waiting is remembered for the next wait.
 */
export class WakeSignal {
  private pending = false;
  private readonly listeners = new Set<WakeListener>();

  notify(): void {
    if (this.listeners.size === 0) {
      this.pending = true;
      return;
    }
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) listener();
  }

  subscribe(listener: WakeListener): () => void {
    if (this.pending) {
      this.pending = false;
      listener();
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
