import type { IngredientCatalog } from '@pantry/shared';
import type { InventoryService, StockCheck } from '../collaborators.js';

/** Process-local stock levels, seeded from each ingredient's `initial_stock`. */
export class InMemoryInventory implements InventoryService {
  private readonly levels = new Map<string, number>();

  constructor(catalog: IngredientCatalog) {
    for (const ingredient of catalog.values()) {
      this.levels.set(ingredient.id, ingredient.initial_stock);
    }
  }

  async check(ingredientId: string, quantity: number): Promise<StockCheck> {
    const level = this.levels.get(ingredientId) ?? 0;
    return { available: level >= quantity, stock_level: level };
  }

  async reserve(ingredientId: string, quantity: number): Promise<StockCheck> {
    const level = this.levels.get(ingredientId) ?? 0;
    if (level < quantity) {
      return { available: false, stock_level: level };
    }
    const remaining = level - quantity;
    this.levels.set(ingredientId, remaining);
    return { available: true, stock_level: remaining };
  }

  async release(ingredientId: string, quantity: number): Promise<void> {
    this.levels.set(ingredientId, (this.levels.get(ingredientId) ?? 0) + quantity);
  }

  async stockLevel(ingredientId: string): Promise<number | null> {
    return this.levels.get(ingredientId) ?? null;
  }
}
