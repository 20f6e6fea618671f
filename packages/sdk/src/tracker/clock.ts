/**
 * Time source for the completion tracker. Injected so waits can run on virtual time in tests.
 */
export interface Clock {
  /** Milliseconds since an arbitrary, monotonic-enough origin. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

// Timers may fire a little before Date.now() catches up; re-arm until it has.
function resolveAt(target: number, resolve: () => void): void {
  const remaining = target - Date.now();
  if (remaining <= 0) {
    resolve();
    return;
  }
  setTimeout(() => resolveAt(target, resolve), remaining);
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise<void>((resolve) => resolveAt(Date.now() + ms, resolve)),
};
