import type { Clock } from './collaborators.js';

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }
}
