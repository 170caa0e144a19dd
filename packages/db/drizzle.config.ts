/// <reference types="node" />
import { defineConfig } from "drizzle-kit";

export default defineConfig({
  dialect: "postgresql",
  // Explicit file list: drizzle-kit loads schemas as CJS and can't follow the
  // .js imports in the ESM barrel (schema/index.ts).
  schema: ["./src/schema/quotes.ts", "./src/schema/orders.ts"],
  out: "./drizzle",
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "",
  },
});
