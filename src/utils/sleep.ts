import { abortReason } from "../errors.js";

/** Longest delay setTimeout honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Resolves after `ms`; rejects with the signal's reason if it aborts first.
 * Waits longer than a single timer allows run as consecutive timers.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const arm = (remaining: number): void => {
      const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        if (remaining > step) {
          arm(remaining - step);
          return;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, step);
    };

    function onAbort(this: AbortSignal): void {
      clearTimeout(timer);
      reject(abortReason(this));
    }

    signal?.addEventListener("abort", onAbort, { once: true });
    arm(Math.max(0, ms));
  });
}
