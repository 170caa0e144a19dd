import type { Storage } from '../collaborators.js';
import type { Order, Quote } from '../types.js';

export class InMemoryStorage implements Storage {
  readonly quotes = new Map<string, Quote>();
  readonly orders = new Map<string, Order>();

  async saveQuote(quote: Quote): Promise<void> {
    this.quotes.set(quote.quote_id, quote);
  }

  async saveOrder(order: Order): Promise<void> {
    this.orders.set(order.order_id, order);
  }

  async getOrder(orderId: string): Promise<Order | null> {
    return this.orders.get(orderId) ?? null;
  }

  async getOrdersByBusinessId(businessId: string): Promise<Order[]> {
    return [...this.orders.values()]
      .filter((order) => order.business_id === businessId)
      .sort((a, b) => a.order_placed_at - b.order_placed_at);
  }
}
