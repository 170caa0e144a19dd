/**
 * Sliding-window quote counter, one timestamp list per ingredient.
 *
 * Entries older than the window are pruned lazily on every read and write;
 * there is no background sweep. All methods are synchronous, so a `record`
 * followed by `countWithinWindow` inside one pricing call cannot interleave
 * with another caller on the event loop.
 */
export class DemandTracker {
  private readonly events = new Map<string, number[]>();

  constructor(private readonly windowMs: number) {}

  /** Append a quote event. Entries already outside the window of `timestamp` are dropped. */
  record(ingredientId: string, timestamp: number): void {
    const kept = this.prune(ingredientId, timestamp, this.windowMs);
    kept.push(timestamp);
    this.events.set(ingredientId, kept);
  }

  /** Number of events with `timestamp > now - windowMs`. */
  countWithinWindow(ingredientId: string, now: number, windowMs: number = this.windowMs): number {
    const kept = this.prune(ingredientId, now, windowMs);
    if (kept.length === 0) {
      this.events.delete(ingredientId);
    } else {
      this.events.set(ingredientId, kept);
    }
    return kept.length;
  }

  trackedIngredients(): string[] {
    return [...this.events.keys()];
  }

  clear(): void {
    this.events.clear();
  }

  private prune(ingredientId: string, now: number, windowMs: number): number[] {
    const cutoff = now - windowMs;
    return (this.events.get(ingredientId) ?? []).filter((ts) => ts > cutoff);
  }
}
