import { performance } from 'node:perf_hooks';

/**
 * Monotonic time source, in milliseconds. Never goes backwards; only
 * differences between two readings are meaningful.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now(),
};

/**
 * A clock that moves only when told to. Lets tests drive the throttle
 * deterministically.
 */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
