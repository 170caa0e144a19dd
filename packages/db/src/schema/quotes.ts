import { pgTable, text, timestamp, numeric, integer, doublePrecision } from "drizzle-orm/pg-core";

/** Audit copy of every issued quote. Live quote state stays in the lifecycle manager. */
export const quotes = pgTable("quotes", {
  id: text("id").primaryKey(),
  ingredientId: text("ingredient_id").notNull(),
  name: text("name").notNull(),
  description: text("description").notNull(),
  unitOfMeasure: text("unit_of_measure").notNull(),
  quantity: doublePrecision("quantity").notNull(),
  pricePerUnit: numeric("price_per_unit", { precision: 12, scale: 2 }).notNull(),
  totalPrice: numeric("total_price", { precision: 12, scale: 2 }).notNull(),
  currency: text("currency").notNull(),
  availableStock: doublePrecision("available_stock").notNull(),
  deliveryTime: integer("delivery_time").notNull(), // seconds
  useByDate: timestamp("use_by_date", { withTimezone: true }).notNull(),
  priceValidUntil: timestamp("price_valid_until", { withTimezone: true }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});
