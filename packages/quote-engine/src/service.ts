import { createPricingPipeline, type DemandTracker } from '@pantry/pricing-core';
import type { IngredientCatalog, PricingRules } from '@pantry/shared';
import { InMemoryInventory } from './adapters/in-memory-inventory.js';
import { InMemoryStorage } from './adapters/in-memory-storage.js';
import { systemClock } from './clock.js';
import type { Clock, DecisionClient, InventoryService, Storage } from './collaborators.js';
import { QuoteLifecycleManager } from './lifecycle/manager.js';
import type { EngineLogger } from './logger.js';
import { NegotiationDecisionEngine } from './negotiation/engine.js';
import { PurchaseProcessor } from './purchase/processor.js';
import { QuoteFactory } from './quote/factory.js';
import type { NegotiateRequest, NegotiationResult, Order, PurchaseRequest, Quote } from './types.js';

export interface QuoteServiceOptions {
  catalog: IngredientCatalog;
  rules: PricingRules;
  inventory?: InventoryService;
  storage?: Storage;
  decisionClient?: DecisionClient;
  clock?: Clock;
  decisionTimeoutMs?: number;
  logger?: EngineLogger;
  generateId?: () => string;
}

export interface QuoteService {
  readonly catalog: IngredientCatalog;
  readonly lifecycle: QuoteLifecycleManager;
  readonly tracker: DemandTracker;
  quote(ingredientId: string, quantity: number): Promise<Quote>;
  negotiate(request: NegotiateRequest): Promise<NegotiationResult>;
  buy(request: PurchaseRequest): Promise<Order>;
  getOrder(orderId: string): Promise<Order | null>;
  listOrdersByBusiness(businessId: string): Promise<Order[]>;
  stockLevel(ingredientId: string): Promise<number | null>;
}

/**
 * Wire pricing, lifecycle, negotiation and purchasing over one set of stores.
 * Inventory and storage default to in-memory implementations.
 */
export function createQuoteService(options: QuoteServiceOptions): QuoteService {
  const { catalog, rules, decisionClient, logger, generateId } = options;
  const clock = options.clock ?? systemClock;
  const inventory = options.inventory ?? new InMemoryInventory(catalog);
  const storage = options.storage ?? new InMemoryStorage();

  const { strategy, tracker } = createPricingPipeline(rules);
  const lifecycle = new QuoteLifecycleManager({ logger });
  const factory = new QuoteFactory({ catalog, strategy, inventory, lifecycle, storage, logger, generateId });
  const negotiation = new NegotiationDecisionEngine({
    catalog,
    lifecycle,
    inventory,
    clock,
    decisionClient,
    timeoutMs: options.decisionTimeoutMs,
    logger,
  });
  const purchases = new PurchaseProcessor({ catalog, strategy, inventory, lifecycle, storage, logger, generateId });

  return {
    catalog,
    lifecycle,
    tracker,
    quote: (ingredientId, quantity) => factory.create(ingredientId, quantity, clock.now()),
    negotiate: (request) => negotiation.negotiate(request, clock.now()),
    buy: (request) => purchases.buy(request, clock.now()),
    getOrder: (orderId) => purchases.getOrder(orderId),
    listOrdersByBusiness: (businessId) => purchases.listOrdersByBusiness(businessId),
    stockLevel: (ingredientId) => inventory.stockLevel(ingredientId),
  };
}
