/**
 * Clock
 *
 * Time source and one-shot timers behind one interface, so TTL expiry and
 * probe timeouts can be driven by a manual clock in tests.
 */

/** Cancels a scheduled callback; calling it after the callback ran is a no-op */
export type CancelTimer = () => void;

export interface Clock {
  /** Epoch milliseconds */
  now(): number;
  schedule(callback: () => void, delayMs: number): CancelTimer;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  schedule: (callback, delayMs) => {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  },
};
