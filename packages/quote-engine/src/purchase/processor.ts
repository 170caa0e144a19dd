import { randomUUID } from 'node:crypto';
import type { PricingStrategy } from '@pantry/pricing-core';
import { roundMoney } from '@pantry/pricing-core';
import { ONE_DAY_MS, type Ingredient, type IngredientCatalog } from '@pantry/shared';
import type { InventoryService, OrderStorage } from '../collaborators.js';
import {
  PersistenceFailureError,
  assertQuantity,
  ingredientMismatch,
  ingredientNotFound,
  insufficientStock,
  priceExceedsMaximum,
} from '../errors.js';
import type { QuoteLifecycleManager } from '../lifecycle/manager.js';
import { createLogger, type EngineLogger } from '../logger.js';
import type { Order, PurchaseRequest } from '../types.js';

export interface PurchaseProcessorOptions {
  catalog: IngredientCatalog;
  strategy: PricingStrategy;
  inventory: InventoryService;
  lifecycle: QuoteLifecycleManager;
  storage: OrderStorage;
  deliveryLeadTimeMs?: number;
  logger?: EngineLogger;
  generateId?: () => string;
}

interface Settlement {
  ingredient: Ingredient;
  request: PurchaseRequest;
  price: number;
  now: number;
}

export class PurchaseProcessor {
  private readonly logger: EngineLogger;
  private readonly generateId: () => string;
  private readonly deliveryLeadTimeMs: number;

  constructor(private readonly options: PurchaseProcessorOptions) {
    this.logger = options.logger ?? createLogger('purchase');
    this.generateId = options.generateId ?? randomUUID;
    this.deliveryLeadTimeMs = options.deliveryLeadTimeMs ?? ONE_DAY_MS;
  }

  /**
   * Turn a quote (or a fresh price when no quote id is given) into an order.
   *
   * A quoted purchase runs entirely under the quote's lock; the quote is only
   * removed once the order has been stored.
   */
  async buy(request: PurchaseRequest, now: number): Promise<Order> {
    const { catalog, strategy, lifecycle } = this.options;

    const ingredient = catalog.get(request.ingredient_id);
    if (!ingredient) {
      throw ingredientNotFound(request.ingredient_id);
    }
    assertQuantity(request.quantity);

    const quoteId = request.quote_id;
    if (quoteId === undefined) {
      const { price_per_unit } = strategy.price(ingredient, request.quantity, now);
      return this.settle({ ingredient, request, price: price_per_unit, now });
    }

    return lifecycle.withQuote<Order>(quoteId, now, async (handle) => {
      if (handle.quote.ingredient_id !== ingredient.id) {
        throw ingredientMismatch(quoteId, handle.quote.ingredient_id, ingredient.id);
      }
      const order = await this.settle({ ingredient, request, price: handle.quote.price_per_unit, now });
      handle.consume();
      return order;
    });
  }

  getOrder(orderId: string): Promise<Order | null> {
    return this.options.storage.getOrder(orderId);
  }

  listOrdersByBusiness(businessId: string): Promise<Order[]> {
    return this.options.storage.getOrdersByBusinessId(businessId);
  }

  private async settle({ ingredient, request, price, now }: Settlement): Promise<Order> {
    const { inventory, storage } = this.options;
    const { quantity, max_acceptable_price_per_unit: ceiling } = request;

    if (ceiling !== undefined && price > ceiling) {
      throw priceExceedsMaximum(price, ceiling);
    }

    const reservation = await inventory.reserve(ingredient.id, quantity);
    if (!reservation.available) {
      throw insufficientStock(ingredient.id, quantity, reservation.stock_level);
    }

    const order = this.buildOrder(ingredient, request, price, now);
    try {
      await storage.saveOrder(order);
    } catch (err) {
      await inventory.release(ingredient.id, quantity);
      const failed = this.buildFailedOrder(order, err);
      this.logger.error({ err, order_id: order.order_id, quote_id: order.quote_id }, 'failed to persist order');
      try {
        await storage.saveOrder(failed);
      } catch (retryErr) {
        this.logger.error({ err: retryErr, order_id: failed.order_id }, 'failed to record failed order');
      }
      throw new PersistenceFailureError(failed, err);
    }

    this.logger.info(
      { order_id: order.order_id, quote_id: order.quote_id, ingredient_id: ingredient.id, quantity, total_cost: order.total_cost },
      'order confirmed',
    );
    return order;
  }

  private buildOrder(ingredient: Ingredient, request: PurchaseRequest, price: number, now: number): Order {
    const total = roundMoney(price * request.quantity);
    return {
      order_id: this.generateId(),
      business_id: request.business_id ?? null,
      quote_id: request.quote_id ?? null,
      items: {
        [ingredient.id]: {
          ingredient_id: ingredient.id,
          quantity: request.quantity,
          price_per_unit_paid: price,
          total_price: total,
          use_by_date: now + ingredient.shelf_life_ms,
        },
      },
      total_cost: total,
      order_placed_at: now,
      expected_delivery: now + this.deliveryLeadTimeMs,
      status: 'CONFIRMED',
      failure_reason: null,
    };
  }

  /** A FAILED order records what was attempted; nothing was charged. */
  private buildFailedOrder(order: Order, err: unknown): Order {
    const items = Object.fromEntries(
      Object.entries(order.items).map(([id, line]) => [id, { ...line, price_per_unit_paid: 0, total_price: 0 }]),
    );
    return {
      ...order,
      items,
      total_cost: 0,
      status: 'FAILED',
      failure_reason: err instanceof Error ? err.message : String(err),
    };
  }
}
