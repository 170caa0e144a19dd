import type { DemandRule } from '@pantry/shared';
import type { DemandTracker } from '../demand/tracker.js';
import type { PricingStrategy } from '../types.js';
import { roundMoney } from '../utils.js';

/**
 * Markup fraction for `quoteCount` quotes in the window:
 * floor(quoteCount / threshold) × hike. Additive per threshold crossed.
 */
export function computeDemandMarkup(quoteCount: number, rule: DemandRule | undefined): number {
  if (!rule || rule.quote_threshold <= 0) return 0;
  return Math.floor(quoteCount / rule.quote_threshold) * rule.price_hike;
}

/**
 * Demand-based markup on top of the wrapped strategy.
 *
 * Each call records a demand event for the ingredient at `now` and then counts
 * the window, so the markup always includes the quote being priced.
 */
export function createDemandAdjustedStrategy(
  inner: PricingStrategy,
  tracker: DemandTracker,
  rules: Record<string, DemandRule>,
  windowMs: number,
): PricingStrategy {
  return {
    kind: 'demand_adjusted',
    inner,
    price(ingredient, quantity, now) {
      const discounted = inner.price(ingredient, quantity, now);

      tracker.record(ingredient.id, now);
      const recent = tracker.countWithinWindow(ingredient.id, now, windowMs);
      const markup = computeDemandMarkup(recent, rules[ingredient.id]);

      return {
        price_per_unit: roundMoney(discounted.price_per_unit * (1 + markup)),
        price_valid_until: discounted.price_valid_until,
      };
    },
  };
}
