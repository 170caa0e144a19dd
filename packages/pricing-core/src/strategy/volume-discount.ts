import type { VolumeDiscountCalculator } from '../discount/volume.js';
import type { PricingStrategy } from '../types.js';
import { roundMoney } from '../utils.js';

/**
 * Applies the volume discount on top of the wrapped strategy's price:
 * `inner × (1 − discountFraction)`, rounded to cents. Validity is inherited.
 */
export function createVolumeDiscountStrategy(
  inner: PricingStrategy,
  calculator: VolumeDiscountCalculator,
): PricingStrategy {
  return {
    kind: 'volume_discount',
    inner,
    price(ingredient, quantity, now) {
      const base = inner.price(ingredient, quantity, now);
      const discount = calculator.discountFraction(ingredient.id, quantity);
      return {
        price_per_unit: roundMoney(base.price_per_unit * (1 - discount)),
        price_valid_until: base.price_valid_until,
      };
    },
  };
}
