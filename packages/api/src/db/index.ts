import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  client: ReturnType<typeof postgres>;
}

export function createDatabase(connectionString: string): DatabaseConnection {
  const client = postgres(connectionString);
  return { db: drizzle(client, { schema }), client };
}
