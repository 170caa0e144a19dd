import { describe, expect, it } from 'vitest';
import { DemandTracker } from '../src/demand/tracker.js';
import { HOUR, T0 } from './fixtures.js';

describe('DemandTracker', () => {
  it('counts events recorded inside the window', () => {
    const tracker = new DemandTracker(4 * HOUR);
    tracker.record('dark_roast_beans', T0);
    tracker.record('dark_roast_beans', T0 + HOUR);
    tracker.record('dark_roast_beans', T0 + 2 * HOUR);

    expect(tracker.countWithinWindow('dark_roast_beans', T0 + 2 * HOUR)).toBe(3);
  });

  it('excludes an event exactly at the window boundary', () => {
    const tracker = new DemandTracker(4 * HOUR);
    tracker.record('dark_roast_beans', T0);

    expect(tracker.countWithinWindow('dark_roast_beans', T0 + 4 * HOUR - 1)).toBe(1);
    expect(tracker.countWithinWindow('dark_roast_beans', T0 + 4 * HOUR)).toBe(0);
  });

  it('prunes stale entries on read', () => {
    const tracker = new DemandTracker(4 * HOUR);
    tracker.record('dark_roast_beans', T0);
    tracker.countWithinWindow('dark_roast_beans', T0 + 5 * HOUR);

    expect(tracker.trackedIngredients()).toEqual([]);
  });

  it('prunes stale entries on write', () => {
    const tracker = new DemandTracker(4 * HOUR);
    tracker.record('dark_roast_beans', T0);
    tracker.record('dark_roast_beans', T0 + 6 * HOUR);

    expect(tracker.countWithinWindow('dark_roast_beans', T0 + 6 * HOUR, 24 * HOUR)).toBe(1);
  });

  it('keeps ingredients independent', () => {
    const tracker = new DemandTracker(4 * HOUR);
    tracker.record('dark_roast_beans', T0);
    tracker.record('dark_roast_beans', T0);
    tracker.record('whole_milk', T0);

    expect(tracker.countWithinWindow('dark_roast_beans', T0)).toBe(2);
    expect(tracker.countWithinWindow('whole_milk', T0)).toBe(1);
    expect(tracker.countWithinWindow('cups', T0)).toBe(0);
  });

  it('reflects a record immediately in the next count', () => {
    const tracker = new DemandTracker(4 * HOUR);
    for (let i = 1; i <= 10; i++) {
      tracker.record('light_roast_beans', T0 + i);
      expect(tracker.countWithinWindow('light_roast_beans', T0 + i)).toBe(i);
    }
  });

  it('clear() forgets every ingredient', () => {
    const tracker = new DemandTracker(4 * HOUR);
    tracker.record('dark_roast_beans', T0);
    tracker.clear();
    expect(tracker.countWithinWindow('dark_roast_beans', T0)).toBe(0);
  });
});
