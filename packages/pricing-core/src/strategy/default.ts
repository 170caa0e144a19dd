import { ONE_DAY_MS } from '@pantry/shared';
import type { PricingStrategy } from '../types.js';

/** Base price, valid for `validityMs` (24h by default). */
export function createDefaultStrategy(validityMs: number = ONE_DAY_MS): PricingStrategy {
  return {
    kind: 'default',
    price(ingredient, _quantity, now) {
      return {
        price_per_unit: ingredient.base_price,
        price_valid_until: now + validityMs,
      };
    },
  };
}
