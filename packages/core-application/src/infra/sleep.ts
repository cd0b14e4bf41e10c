import type { Sleeper } from "../ports/retry-policy";
import type { CancellationToken } from "../application/cancellation";
import type { WakeSignal } from "../application/wake-signal";

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type IdleOutcome = "elapsed" | "cancelled" | "woken";

/** Waits `ms`, or less if the token is cancelled or the wake signal fires. */
export function idle(ms: number, token: CancellationToken, wake?: WakeSignal): Promise<IdleOutcome> {
  return new Promise((resolve) => {
    let settled = false;
    const cleanups: Array<() => void> = [];

    const finish = (outcome: IdleOutcome) => {
      if (settled) return;
      settled = true;
      for (const cleanup of cleanups) cleanup();
      resolve(outcome);
    };

    const timer = setTimeout(() => finish("elapsed"), ms);
    cleanups.push(() => clearTimeout(timer));
    cleanups.push(token.onCancel(() => finish("cancelled")));
    if (wake && !settled) cleanups.push(wake.subscribe(() => finish("woken")));

    // listeners may have fired synchronously while subscribing
    if (settled) for (const cleanup of cleanups) cleanup();
  });
}
