import type { Clock } from "../tracker/clock";

/**
 * Virtual clock: `sleep` resolves immediately and advances time by the requested amount.
 * `sleeps` records every requested duration.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
