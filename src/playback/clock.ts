/** Monotonic time source in seconds. */
export interface Clock {
  now(): number;
}

/** Cancels a repeating timer. */
export type CancelTimer = () => void;

/** Repeating timer facility; swapped for a manual one in tests. */
export interface TimerHost {
  every(intervalMs: number, callback: () => void): CancelTimer;
}

export const performanceClock: Clock = {
  now: () => performance.now() / 1000
};

/** Timers backed by the global `setInterval`, looked up on each call. */
export const intervalTimers: TimerHost = {
  every(intervalMs, callback) {
    const handle = setInterval(callback, intervalMs);
    return () => clearInterval(handle);
  }
};
