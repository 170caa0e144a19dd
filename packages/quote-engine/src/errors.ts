import type { Order } from './types.js';

export enum QuoteErrorCode {
  INGREDIENT_NOT_FOUND = 'INGREDIENT_NOT_FOUND',
  QUOTE_NOT_FOUND = 'QUOTE_NOT_FOUND',
  QUOTE_EXPIRED = 'QUOTE_EXPIRED',
  ALREADY_NEGOTIATED = 'ALREADY_NEGOTIATED',
  INVALID_PROPOSAL = 'INVALID_PROPOSAL',
  INSUFFICIENT_STOCK = 'INSUFFICIENT_STOCK',
  PRICE_EXCEEDS_MAXIMUM = 'PRICE_EXCEEDS_MAXIMUM',
  INGREDIENT_MISMATCH = 'INGREDIENT_MISMATCH',
  INVALID_QUANTITY = 'INVALID_QUANTITY',
  DECISION_CLIENT_UNAVAILABLE = 'DECISION_CLIENT_UNAVAILABLE',
  PERSISTENCE_FAILURE = 'PERSISTENCE_FAILURE',
}

export type ErrorCategory = 'not_found' | 'precondition_failed' | 'validation_failed' | 'internal';

const CATEGORIES: Record<QuoteErrorCode, ErrorCategory> = {
  [QuoteErrorCode.INGREDIENT_NOT_FOUND]: 'not_found',
  [QuoteErrorCode.QUOTE_NOT_FOUND]: 'not_found',
  [QuoteErrorCode.QUOTE_EXPIRED]: 'precondition_failed',
  [QuoteErrorCode.ALREADY_NEGOTIATED]: 'precondition_failed',
  [QuoteErrorCode.INVALID_PROPOSAL]: 'precondition_failed',
  [QuoteErrorCode.INSUFFICIENT_STOCK]: 'precondition_failed',
  [QuoteErrorCode.PRICE_EXCEEDS_MAXIMUM]: 'precondition_failed',
  [QuoteErrorCode.INGREDIENT_MISMATCH]: 'precondition_failed',
  [QuoteErrorCode.INVALID_QUANTITY]: 'validation_failed',
  [QuoteErrorCode.DECISION_CLIENT_UNAVAILABLE]: 'internal',
  [QuoteErrorCode.PERSISTENCE_FAILURE]: 'internal',
};

export class QuoteEngineError extends Error {
  readonly code: QuoteErrorCode;
  readonly category: ErrorCategory;
  readonly details: Record<string, unknown>;

  constructor(code: QuoteErrorCode, message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = 'QuoteEngineError';
    this.code = code;
    this.category = CATEGORIES[code];
    this.details = details;
  }
}

/** Storing a confirmed order failed after stock was reserved. Carries the FAILED order that replaced it. */
export class PersistenceFailureError extends QuoteEngineError {
  readonly order: Order;

  constructor(order: Order, cause: unknown) {
    super(
      QuoteErrorCode.PERSISTENCE_FAILURE,
      `Order ${order.order_id} could not be saved: ${order.failure_reason ?? 'unknown error'}`,
      { order_id: order.order_id, quote_id: order.quote_id },
      { cause },
    );
    this.name = 'PersistenceFailureError';
    this.order = order;
  }
}

export function isQuoteEngineError(err: unknown): err is QuoteEngineError {
  return err instanceof QuoteEngineError;
}

// ─── Constructors ────────────────────────────────────────────

export function ingredientNotFound(ingredientId: string): QuoteEngineError {
  return new QuoteEngineError(QuoteErrorCode.INGREDIENT_NOT_FOUND, `Ingredient ${ingredientId} not found`, {
    ingredient_id: ingredientId,
  });
}

export function quoteNotFound(quoteId: string): QuoteEngineError {
  return new QuoteEngineError(QuoteErrorCode.QUOTE_NOT_FOUND, `Quote ${quoteId} not found`, { quote_id: quoteId });
}

export function quoteExpired(quoteId: string, validUntil: number): QuoteEngineError {
  return new QuoteEngineError(
    QuoteErrorCode.QUOTE_EXPIRED,
    `Quote ${quoteId} expired at ${new Date(validUntil).toISOString()}. Request a new quote.`,
    { quote_id: quoteId, price_valid_until: validUntil },
  );
}

export function alreadyNegotiated(quoteId: string): QuoteEngineError {
  return new QuoteEngineError(
    QuoteErrorCode.ALREADY_NEGOTIATED,
    `Quote ${quoteId} has already been negotiated`,
    { quote_id: quoteId },
  );
}

export function invalidProposal(message: string, details: Record<string, unknown>): QuoteEngineError {
  return new QuoteEngineError(QuoteErrorCode.INVALID_PROPOSAL, message, details);
}

export function insufficientStock(ingredientId: string, requested: number, available: number): QuoteEngineError {
  return new QuoteEngineError(
    QuoteErrorCode.INSUFFICIENT_STOCK,
    `Insufficient stock for ${ingredientId}. Requested: ${requested}, available: ${available.toFixed(2)}`,
    { ingredient_id: ingredientId, requested, available },
  );
}

export function priceExceedsMaximum(price: number, maximum: number): QuoteEngineError {
  return new QuoteEngineError(
    QuoteErrorCode.PRICE_EXCEEDS_MAXIMUM,
    `Price ${price.toFixed(2)} exceeds maximum acceptable ${maximum.toFixed(2)}`,
    { price_per_unit: price, max_acceptable_price_per_unit: maximum },
  );
}

export function ingredientMismatch(quoteId: string, quoted: string, requested: string): QuoteEngineError {
  return new QuoteEngineError(
    QuoteErrorCode.INGREDIENT_MISMATCH,
    `Quote ${quoteId} was issued for ${quoted}, not ${requested}`,
    { quote_id: quoteId, quoted_ingredient_id: quoted, requested_ingredient_id: requested },
  );
}

/** Throws INVALID_QUANTITY unless `quantity` is a positive finite number. */
export function assertQuantity(quantity: number): void {
  if (!Number.isFinite(quantity) || quantity <= 0) {
    throw new QuoteEngineError(
      QuoteErrorCode.INVALID_QUANTITY,
      `Quantity must be a positive number, got ${quantity}`,
      { quantity },
    );
  }
}
