import { describe, expect, it } from 'vitest';
import { createPricingPipeline } from '../src/strategy/pipeline.js';
import { DemandTracker } from '../src/demand/tracker.js';
import { HOUR, T0, makeIngredient, makeRules } from './fixtures.js';

describe('createPricingPipeline', () => {
  it('assembles default → volume → demand', () => {
    const { strategy } = createPricingPipeline(makeRules());
    expect(strategy.kind).toBe('demand_adjusted');
    expect(strategy.price(makeIngredient(), 50, T0)).toEqual({
      price_per_unit: 10.5,
      price_valid_until: T0 + 24 * HOUR,
    });
  });

  it('exposes the tracker it records into', () => {
    const { strategy, tracker } = createPricingPipeline(makeRules());
    strategy.price(makeIngredient(), 1, T0);
    strategy.price(makeIngredient(), 1, T0);
    expect(tracker.countWithinWindow('dark_roast_beans', T0)).toBe(2);
  });

  it('shares an injected tracker', () => {
    const tracker = new DemandTracker(4 * HOUR);
    const a = createPricingPipeline(makeRules(), tracker);
    const b = createPricingPipeline(makeRules(), tracker);
    a.strategy.price(makeIngredient(), 1, T0);
    b.strategy.price(makeIngredient(), 1, T0);
    expect(tracker.countWithinWindow('dark_roast_beans', T0)).toBe(2);
  });

  it('throws on an invalid configuration', () => {
    expect(() => createPricingPipeline(makeRules({ demand_window_ms: 0 }))).toThrow(
      'Invalid pricing config: INVALID_WINDOW',
    );
    expect(() =>
      createPricingPipeline(
        makeRules({ demand_rules: { cups: { quote_threshold: 0, price_hike: 0.1 } } }),
      ),
    ).toThrow('Invalid pricing config: INVALID_QUOTE_THRESHOLD (cups)');
  });
});
