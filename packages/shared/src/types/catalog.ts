/**
 * Immutable reference data for a purchasable ingredient.
 * Durations are milliseconds; prices are in `currency` units per `unit_of_measure`.
 */
export interface Ingredient {
  id: string;
  name: string;
  description: string;
  unit_of_measure: string;
  currency: string;
  base_price: number;
  shelf_life_ms: number;
  initial_stock: number;
}

/** Discount applied once the ordered quantity reaches `min_quantity`. */
export interface VolumeDiscountTier {
  min_quantity: number;
  discount: number; // fraction, 0.10 = 10% off
}

/** Demand markup: every `quote_threshold` quotes in the window add `price_hike` to the multiplier. */
export interface DemandRule {
  quote_threshold: number;
  price_hike: number;
}

export type IngredientCatalog = ReadonlyMap<string, Ingredient>;

/** Pricing configuration as loaded from data/pricing-rules.json. */
export interface PricingRules {
  demand_window_ms: number;
  price_validity_ms: number;
  volume_discounts: Record<string, VolumeDiscountTier[]>;
  demand_rules: Record<string, DemandRule>;
}
