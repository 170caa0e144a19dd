import type { DemandRule, Ingredient, VolumeDiscountTier } from '@pantry/shared';

/** Output of a pricing strategy. Timestamps are epoch milliseconds. */
export interface PriceQuote {
  price_per_unit: number;
  price_valid_until: number;
}

export type StrategyKind = 'default' | 'volume_discount' | 'demand_adjusted';

/** A pricing layer. Composite strategies hold the layer they wrap in `inner`. */
export interface PricingStrategy {
  readonly kind: StrategyKind;
  readonly inner?: PricingStrategy;
  price(ingredient: Ingredient, quantity: number, now: number): PriceQuote;
}

/** Everything needed to assemble the default → volume → demand pipeline. */
export interface PricingConfig {
  volume_discounts: Record<string, VolumeDiscountTier[]>;
  demand_rules: Record<string, DemandRule>;
  demand_window_ms: number;
  price_validity_ms: number;
}

/** Pricing configuration errors. */
export enum PricingConfigError {
  INVALID_DISCOUNT = 'INVALID_DISCOUNT',
  INVALID_TIER_QUANTITY = 'INVALID_TIER_QUANTITY',
  INVALID_QUOTE_THRESHOLD = 'INVALID_QUOTE_THRESHOLD',
  INVALID_PRICE_HIKE = 'INVALID_PRICE_HIKE',
  INVALID_WINDOW = 'INVALID_WINDOW',
  INVALID_VALIDITY = 'INVALID_VALIDITY',
}
