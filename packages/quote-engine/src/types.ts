import type { ORDER_STATUSES, QUOTE_STATUSES } from '@pantry/shared';

/** Quote lifecycle status. CONSUMED and EXPIRED are terminal. */
export type QuoteStatus = (typeof QUOTE_STATUSES)[number];

/**
 * A priced, time-bounded offer. Never mutated after creation: an accepted
 * negotiation produces a successor with the same `quote_id`.
 * Timestamps are epoch milliseconds; `delivery_time` is seconds.
 */
export interface Quote {
  quote_id: string;
  ingredient_id: string;
  name: string;
  description: string;
  unit_of_measure: string;
  quantity: number;
  price_per_unit: number;
  total_price: number;
  currency: string;
  available_stock: number;
  delivery_time: number;
  use_by_date: number;
  price_valid_until: number;
  created_at: number;
}

export type DecisionSource = 'ai' | 'fallback';

/** The single negotiation attempt allowed per quote. */
export interface NegotiationRecord {
  quote_id: string;
  proposed_price_per_unit: number;
  rationale: string;
  accepted: boolean;
  decision_rationale: string;
  decided_by: DecisionSource;
  decided_at: number;
}

export interface NegotiateRequest {
  quote_id: string;
  proposed_price_per_unit: number;
  rationale: string;
}

export interface NegotiationResult {
  original_quote: Quote;
  proposed_price_per_unit: number;
  final_price_per_unit: number;
  accepted: boolean;
  decision_rationale: string;
  decided_by: DecisionSource;
  new_quote: Quote | null;
}

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface OrderLine {
  ingredient_id: string;
  quantity: number;
  price_per_unit_paid: number;
  total_price: number;
  use_by_date: number;
}

export interface Order {
  order_id: string;
  business_id: string | null;
  quote_id: string | null;
  items: Record<string, OrderLine>;
  total_cost: number;
  order_placed_at: number;
  expected_delivery: number;
  status: OrderStatus;
  failure_reason: string | null;
}

export interface PurchaseRequest {
  quote_id?: string;
  ingredient_id: string;
  quantity: number;
  business_id?: string;
  max_acceptable_price_per_unit?: number;
}
