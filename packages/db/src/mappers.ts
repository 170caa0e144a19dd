import type { Order, Quote } from "@pantry/quote-engine";
import type { orders, quotes } from "./schema/index.js";

export type QuoteRow = typeof quotes.$inferSelect;
export type NewQuoteRow = typeof quotes.$inferInsert;
export type OrderRow = typeof orders.$inferSelect;
export type NewOrderRow = typeof orders.$inferInsert;

/** numeric(12,2) columns travel as strings. */
function money(value: number): string {
  return value.toFixed(2);
}

export function quoteToRow(quote: Quote): NewQuoteRow {
  return {
    id: quote.quote_id,
    ingredientId: quote.ingredient_id,
    name: quote.name,
    description: quote.description,
    unitOfMeasure: quote.unit_of_measure,
    quantity: quote.quantity,
    pricePerUnit: money(quote.price_per_unit),
    totalPrice: money(quote.total_price),
    currency: quote.currency,
    availableStock: quote.available_stock,
    deliveryTime: quote.delivery_time,
    useByDate: new Date(quote.use_by_date),
    priceValidUntil: new Date(quote.price_valid_until),
    createdAt: new Date(quote.created_at),
  };
}

export function orderToRow(order: Order): NewOrderRow {
  return {
    id: order.order_id,
    businessId: order.business_id,
    quoteId: order.quote_id,
    items: order.items,
    totalCost: money(order.total_cost),
    status: order.status,
    failureReason: order.failure_reason,
    orderPlacedAt: new Date(order.order_placed_at),
    expectedDelivery: new Date(order.expected_delivery),
  };
}

export function rowToOrder(row: OrderRow): Order {
  return {
    order_id: row.id,
    business_id: row.businessId,
    quote_id: row.quoteId,
    items: row.items,
    total_cost: Number(row.totalCost),
    order_placed_at: row.orderPlacedAt.getTime(),
    expected_delivery: row.expectedDelivery.getTime(),
    status: row.status,
    failure_reason: row.failureReason,
  };
}
