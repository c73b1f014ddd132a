import { drizzle } from "drizzle-orm/postgres-js";
import { migrate } from "drizzle-orm/postgres-js/migrator";
import postgres from "postgres";
import { loadConfig } from "../config.js";
import { EMBEDDING_INDEX_SQL } from "./schema.js";

async function runMigrations() {
  const { DATABASE_URL } = loadConfig();
  const client = postgres(DATABASE_URL, { max: 1 });
  const db = drizzle(client);

  // document_chunks.embedding needs pgvector before the first migration runs
  await client.unsafe("CREATE EXTENSION IF NOT EXISTS vector");

  console.log("Running migrations...");
  await migrate(db, { migrationsFolder: new URL("./migrations", import.meta.url).pathname });
  await client.unsafe(EMBEDDING_INDEX_SQL);
  console.log("Migrations complete.");

  await client.end();
}

runMigrations().catch((err: unknown) => {
  console.error("Migration failed:", err);
  process.exit(1);
});
