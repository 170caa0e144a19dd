import type { VolumeDiscountTier } from '@pantry/shared';

/**
 * Tiered volume discounts. The highest threshold the quantity meets wins;
 * tiers do not stack.
 */
export class VolumeDiscountCalculator {
  private readonly tiers: ReadonlyMap<string, readonly VolumeDiscountTier[]>;

  constructor(tiers: Record<string, VolumeDiscountTier[]>) {
    const sorted = new Map<string, VolumeDiscountTier[]>();
    for (const [ingredientId, list] of Object.entries(tiers)) {
      sorted.set(ingredientId, [...list].sort((a, b) => a.min_quantity - b.min_quantity));
    }
    this.tiers = sorted;
  }

  discountFraction(ingredientId: string, quantity: number): number {
    let applied = 0;
    for (const tier of this.tiers.get(ingredientId) ?? []) {
      if (quantity < tier.min_quantity) break;
      applied = tier.discount;
    }
    return applied;
  }
}
