import type { Ingredient, PricingRules } from '@pantry/shared';

export const HOUR = 60 * 60 * 1000;
export const T0 = Date.UTC(2026, 0, 5, 9, 0, 0);

export function makeIngredient(overrides?: Partial<Ingredient>): Ingredient {
  return {
    id: 'dark_roast_beans',
    name: 'Dark Roast Beans',
    description: 'Bold robusta dark roast',
    unit_of_measure: 'kg',
    currency: 'USD',
    base_price: 15,
    shelf_life_ms: 168 * HOUR,
    initial_stock: 1000,
    ...overrides,
  };
}

export function makeRules(overrides?: Partial<PricingRules>): PricingRules {
  return {
    demand_window_ms: 4 * HOUR,
    price_validity_ms: 24 * HOUR,
    volume_discounts: {
      dark_roast_beans: [
        { min_quantity: 50, discount: 0.3 },
        { min_quantity: 10, discount: 0.1 },
        { min_quantity: 25, discount: 0.2 },
      ],
      light_roast_beans: [
        { min_quantity: 10, discount: 0.05 },
        { min_quantity: 20, discount: 0.15 },
      ],
    },
    demand_rules: {
      dark_roast_beans: { quote_threshold: 5, price_hike: 0.05 },
      light_roast_beans: { quote_threshold: 3, price_hike: 0.08 },
    },
    ...overrides,
  };
}
