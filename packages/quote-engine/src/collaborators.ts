import type { Order, Quote } from './types.js';

export interface StockCheck {
  available: boolean;
  stock_level: number;
}

/** Stock availability. `reserve` checks and decrements in one step. */
export interface InventoryService {
  check(ingredientId: string, quantity: number): Promise<StockCheck>;
  reserve(ingredientId: string, quantity: number): Promise<StockCheck>;
  release(ingredientId: string, quantity: number): Promise<void>;
  stockLevel(ingredientId: string): Promise<number | null>;
}

export interface QuoteStorage {
  saveQuote(quote: Quote): Promise<void>;
}

export interface OrderStorage {
  saveOrder(order: Order): Promise<void>;
  getOrder(orderId: string): Promise<Order | null>;
  getOrdersByBusinessId(businessId: string): Promise<Order[]>;
}

export type Storage = QuoteStorage & OrderStorage;

/** Storage that can drop everything it holds. Only database storage offers it. */
export interface ResettableStorage {
  reset(): Promise<void>;
}

/** Everything the decision client is told about a counter-offer. */
export interface DecisionContext {
  quote_id: string;
  ingredient_id: string;
  ingredient_name: string;
  currency: string;
  quantity: number;
  base_price: number;
  quoted_price: number;
  proposed_price: number;
  rationale: string;
  stock_level: number;
}

/**
 * External accept/reject oracle (an LLM in production). The response is
 * untrusted and validated by the caller; `signal` aborts on timeout.
 */
export interface DecisionClient {
  decide(context: DecisionContext, signal: AbortSignal): Promise<unknown>;
}

export interface Clock {
  now(): number;
}
