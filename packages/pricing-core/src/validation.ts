import type { DemandRule, VolumeDiscountTier } from '@pantry/shared';
import type { PricingConfig } from './types.js';
import { PricingConfigError } from './types.js';

export function validateTiers(tiers: VolumeDiscountTier[]): PricingConfigError | null {
  for (const tier of tiers) {
    if (!(tier.min_quantity > 0)) {
      return PricingConfigError.INVALID_TIER_QUANTITY;
    }
    if (!(tier.discount >= 0 && tier.discount < 1)) {
      return PricingConfigError.INVALID_DISCOUNT;
    }
  }
  return null;
}

export function validateDemandRule(rule: DemandRule): PricingConfigError | null {
  if (!Number.isInteger(rule.quote_threshold) || rule.quote_threshold <= 0) {
    return PricingConfigError.INVALID_QUOTE_THRESHOLD;
  }
  if (!(rule.price_hike >= 0)) {
    return PricingConfigError.INVALID_PRICE_HIKE;
  }
  return null;
}

/** Validate a full PricingConfig. Returns the first error found, or null. */
export function validatePricingConfig(
  config: PricingConfig,
): { error: PricingConfigError; detail?: string } | null {
  if (!(config.demand_window_ms > 0)) {
    return { error: PricingConfigError.INVALID_WINDOW };
  }
  if (!(config.price_validity_ms > 0)) {
    return { error: PricingConfigError.INVALID_VALIDITY };
  }

  for (const [ingredientId, tiers] of Object.entries(config.volume_discounts)) {
    const err = validateTiers(tiers);
    if (err) return { error: err, detail: ingredientId };
  }

  for (const [ingredientId, rule] of Object.entries(config.demand_rules)) {
    const err = validateDemandRule(rule);
    if (err) return { error: err, detail: ingredientId };
  }

  return null;
}
