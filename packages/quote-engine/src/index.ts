// Types
export type {
  QuoteStatus,
  Quote,
  DecisionSource,
  NegotiationRecord,
  NegotiateRequest,
  NegotiationResult,
  OrderStatus,
  OrderLine,
  Order,
  PurchaseRequest,
} from './types.js';
export type {
  StockCheck,
  InventoryService,
  QuoteStorage,
  OrderStorage,
  Storage,
  ResettableStorage,
  DecisionContext,
  DecisionClient,
  Clock,
} from './collaborators.js';

// Errors
export {
  QuoteEngineError,
  QuoteErrorCode,
  PersistenceFailureError,
  isQuoteEngineError,
} from './errors.js';
export type { ErrorCategory } from './errors.js';

// Clock + logging
export { systemClock, ManualClock } from './clock.js';
export { createLogger } from './logger.js';
export type { EngineLogger } from './logger.js';

// Lifecycle
export { transition } from './lifecycle/state-machine.js';
export type { QuoteEvent } from './lifecycle/state-machine.js';
export { KeyedMutex } from './lifecycle/keyed-mutex.js';
export { QuoteLifecycleManager, QUOTE_CLEANUP_THRESHOLD } from './lifecycle/manager.js';
export type { LiveQuote, LiveStatus, QuoteHandle, LifecycleOptions } from './lifecycle/manager.js';

// Quotes
export { QuoteFactory, DELIVERY_TIME_SECONDS } from './quote/factory.js';
export type { QuoteFactoryOptions } from './quote/factory.js';

// Negotiation
export {
  NegotiationDecisionEngine,
  DEFAULT_DECISION_TIMEOUT_MS,
  buildSuccessorQuote,
} from './negotiation/engine.js';
export type { NegotiationEngineOptions } from './negotiation/engine.js';
export { evaluateFallback, FALLBACK_MAX_DISCOUNT, DETERMINISTIC_PREFIX } from './negotiation/fallback.js';
export { decisionResponseSchema } from './negotiation/schema.js';
export type { DecisionResponse } from './negotiation/schema.js';
export { withTimeout } from './negotiation/timeout.js';

// Purchasing
export { PurchaseProcessor } from './purchase/processor.js';
export type { PurchaseProcessorOptions } from './purchase/processor.js';

// Adapters
export { InMemoryInventory } from './adapters/in-memory-inventory.js';
export { InMemoryStorage } from './adapters/in-memory-storage.js';

// Service
export { createQuoteService } from './service.js';
export type { QuoteService, QuoteServiceOptions } from './service.js';
