import { randomUUID } from 'node:crypto';
import type { PricingStrategy } from '@pantry/pricing-core';
import { roundMoney } from '@pantry/pricing-core';
import { ONE_DAY_MS, type IngredientCatalog } from '@pantry/shared';
import type { InventoryService, QuoteStorage } from '../collaborators.js';
import { assertQuantity, ingredientNotFound, insufficientStock } from '../errors.js';
import type { QuoteLifecycleManager } from '../lifecycle/manager.js';
import { createLogger, type EngineLogger } from '../logger.js';
import type { Quote } from '../types.js';

/** Delivery lead time quoted to customers, in seconds. */
export const DELIVERY_TIME_SECONDS = ONE_DAY_MS / 1000;

export interface QuoteFactoryOptions {
  catalog: IngredientCatalog;
  strategy: PricingStrategy;
  inventory: InventoryService;
  lifecycle: QuoteLifecycleManager;
  storage?: QuoteStorage;
  logger?: EngineLogger;
  generateId?: () => string;
}

export class QuoteFactory {
  private readonly logger: EngineLogger;
  private readonly generateId: () => string;

  constructor(private readonly options: QuoteFactoryOptions) {
    this.logger = options.logger ?? createLogger('quote-factory');
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Price `quantity` of an ingredient and open a quote for it.
   *
   * Stock is checked before pricing, so a quote that fails on stock does not
   * count towards demand.
   */
  async create(ingredientId: string, quantity: number, now: number): Promise<Quote> {
    const { catalog, strategy, inventory, lifecycle, storage } = this.options;

    const ingredient = catalog.get(ingredientId);
    if (!ingredient) {
      throw ingredientNotFound(ingredientId);
    }
    assertQuantity(quantity);

    const stock = await inventory.check(ingredientId, quantity);
    if (!stock.available) {
      throw insufficientStock(ingredientId, quantity, stock.stock_level);
    }

    const { price_per_unit, price_valid_until } = strategy.price(ingredient, quantity, now);

    const quote: Quote = {
      quote_id: this.generateId(),
      ingredient_id: ingredient.id,
      name: ingredient.name,
      description: ingredient.description,
      unit_of_measure: ingredient.unit_of_measure,
      quantity,
      price_per_unit,
      total_price: roundMoney(price_per_unit * quantity),
      currency: ingredient.currency,
      available_stock: stock.stock_level,
      delivery_time: DELIVERY_TIME_SECONDS,
      use_by_date: now + ingredient.shelf_life_ms,
      price_valid_until,
      created_at: now,
    };

    lifecycle.open(quote, now);
    this.logger.info(
      { quote_id: quote.quote_id, ingredient_id: ingredientId, quantity, price_per_unit },
      'quote issued',
    );

    if (storage) {
      try {
        await storage.saveQuote(quote);
      } catch (err) {
        // best-effort: the lifecycle store is authoritative for open quotes
        this.logger.error({ err, quote_id: quote.quote_id }, 'failed to persist quote');
      }
    }

    return quote;
  }
}
