import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export type Database = ReturnType<typeof createDb>;

export function createDb(connectionString: string) {
  const client = postgres(connectionString, {
    prepare: false, // transaction-mode connection poolers reject prepared statements
  });

  return drizzle(client, { schema });
}
