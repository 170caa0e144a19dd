export { createDb } from "./client.js";
export type { Database } from "./client.js";

export { DrizzleStorage } from "./storage.js";
export { quoteToRow, orderToRow, rowToOrder } from "./mappers.js";
export type { QuoteRow, NewQuoteRow, OrderRow, NewOrderRow } from "./mappers.js";

// Re-export schema for convenience
export * from "./schema/index.js";
