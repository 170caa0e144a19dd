import { asc, eq } from "drizzle-orm";
import type { Order, Quote, ResettableStorage, Storage } from "@pantry/quote-engine";
import type { Database } from "./client.js";
import { orderToRow, quoteToRow, rowToOrder } from "./mappers.js";
import { orders, quotes } from "./schema/index.js";

/** Postgres-backed quote and order storage. */
export class DrizzleStorage implements Storage, ResettableStorage {
  constructor(private readonly db: Database) {}

  async saveQuote(quote: Quote): Promise<void> {
    await this.db.insert(quotes).values(quoteToRow(quote)).onConflictDoNothing();
  }

  /** Upsert: a FAILED order may replace a CONFIRMED write that never landed. */
  async saveOrder(order: Order): Promise<void> {
    const row = orderToRow(order);
    await this.db
      .insert(orders)
      .values(row)
      .onConflictDoUpdate({
        target: orders.id,
        set: {
          items: row.items,
          totalCost: row.totalCost,
          status: row.status,
          failureReason: row.failureReason,
        },
      });
  }

  async getOrder(orderId: string): Promise<Order | null> {
    const row = await this.db.query.orders.findFirst({
      where: (fields, ops) => ops.eq(fields.id, orderId),
    });
    return row ? rowToOrder(row) : null;
  }

  async getOrdersByBusinessId(businessId: string): Promise<Order[]> {
    const rows = await this.db
      .select()
      .from(orders)
      .where(eq(orders.businessId, businessId))
      .orderBy(asc(orders.orderPlacedAt));
    return rows.map(rowToOrder);
  }

  /** Delete every order and quote row. */
  async reset(): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(orders);
      await tx.delete(quotes);
    });
  }
}
