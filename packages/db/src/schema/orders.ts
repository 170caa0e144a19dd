import { pgTable, text, timestamp, numeric, jsonb, index } from "drizzle-orm/pg-core";
import type { OrderLine } from "@pantry/quote-engine";

export const orders = pgTable(
  "orders",
  {
    id: text("id").primaryKey(),
    businessId: text("business_id"),
    quoteId: text("quote_id"),
    items: jsonb("items").$type<Record<string, OrderLine>>().notNull(),
    totalCost: numeric("total_cost", { precision: 12, scale: 2 }).notNull(),
    status: text("status", { enum: ["CONFIRMED", "FAILED"] }).notNull(),
    failureReason: text("failure_reason"),
    orderPlacedAt: timestamp("order_placed_at", { withTimezone: true }).notNull(),
    expectedDelivery: timestamp("expected_delivery", { withTimezone: true }).notNull(),
  },
  (table) => ({
    businessIdx: index("orders_business_id_idx").on(table.businessId),
  }),
);
