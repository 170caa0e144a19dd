import { pino } from 'pino';
import { createCatalog, type Ingredient, type PricingRules } from '@pantry/shared';
import type { Quote } from '../src/types.js';

export const HOUR = 60 * 60 * 1000;
export const T0 = Date.UTC(2026, 0, 5, 9, 0, 0);

export const silentLogger = pino({ level: 'silent' });

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

export function makeCatalog() {
  return createCatalog([
    makeIngredient(),
    makeIngredient({
      id: 'whole_milk',
      name: 'Whole Milk',
      description: 'Fresh whole milk',
      unit_of_measure: 'liter',
      base_price: 2.5,
      shelf_life_ms: 72 * HOUR,
      initial_stock: 500,
    }),
  ]);
}

export function makeRules(overrides?: Partial<PricingRules>): PricingRules {
  return {
    demand_window_ms: 4 * HOUR,
    price_validity_ms: 24 * HOUR,
    volume_discounts: {
      dark_roast_beans: [
        { min_quantity: 10, discount: 0.1 },
        { min_quantity: 25, discount: 0.2 },
        { min_quantity: 50, discount: 0.3 },
      ],
    },
    demand_rules: {
      dark_roast_beans: { quote_threshold: 5, price_hike: 0.05 },
    },
    ...overrides,
  };
}

/** Dark roast quote for 10 kg at 17.50 (base 15.00), issued at T0. */
export function makeQuote(overrides?: Partial<Quote>): Quote {
  return {
    quote_id: 'q-1',
    ingredient_id: 'dark_roast_beans',
    name: 'Dark Roast Beans',
    description: 'Bold robusta dark roast',
    unit_of_measure: 'kg',
    quantity: 10,
    price_per_unit: 17.5,
    total_price: 175,
    currency: 'USD',
    available_stock: 1000,
    delivery_time: 86400,
    use_by_date: T0 + 168 * HOUR,
    price_valid_until: T0 + 24 * HOUR,
    created_at: T0,
    ...overrides,
  };
}

export function sequence(prefix: string): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
