import {
  pgSchema,
  bigserial,
  uuid,
  varchar,
  text,
  integer,
  timestamp,
  jsonb,
  index,
  unique,
  customType,
} from "drizzle-orm/pg-core";

// ─── Custom vector type for pgvector ─────────────────────────────────

export const EMBEDDING_DIMENSIONS = 1536;

export function toVectorLiteral(value: readonly number[]): string {
  return `[${value.join(",")}]`;
}

export const vector = customType<{
  data: number[];
  driverParam: string;
  config: { dimensions: number };
}>({
  dataType(config) {
    return `vector(${config?.dimensions ?? EMBEDDING_DIMENSIONS})`;
  },
  toDriver(value: number[]): string {
    return toVectorLiteral(value);
  },
  fromDriver(value: unknown): number[] {
    if (typeof value === "string") {
      return value
        .replace(/^\[/, "")
        .replace(/\]$/, "")
        .split(",")
        .map(Number);
    }
    return Array.isArray(value) ? value.map(Number) : [];
  },
});

// ─── Schema ──────────────────────────────────────────────────────────
export const supportSchema = pgSchema("support");

export const chatRoleEnum = supportSchema.enum("chat_role", ["user", "assistant"]);

// ─── 1. chat_messages ────────────────────────────────────────────────

export const chatMessages = supportSchema.table(
  "chat_messages",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    chatId: uuid("chat_id").notNull(),
    seq: integer("seq").notNull(),
    role: chatRoleEnum("role").notNull(),
    content: text("content").notNull(),
    contextSlugs: jsonb("context_slugs").$type<string[]>(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index("idx_chat_messages_chat_id").on(table.chatId),
    index("idx_chat_messages_created_at").on(table.createdAt),
    unique("uq_chat_messages_chat_seq").on(table.chatId, table.seq),
  ],
);

// ─── 2. document_chunks ──────────────────────────────────────────────

export const documentChunks = supportSchema.table(
  "document_chunks",
  {
    id: varchar("id", { length: 255 }).primaryKey(),
    title: text("title").notNull(),
    slug: varchar("slug", { length: 500 }),
    content: text("content").notNull(),
    contentHash: varchar("content_hash", { length: 64 }).notNull(),
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
    metadataJson: jsonb("metadata_json").$type<Record<string, unknown>>(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index("idx_document_chunks_slug").on(table.slug)],
);

// drizzle-kit does not emit the vector_cosine_ops operator class, so the HNSW
// index is created by db/migrate.ts after the migrations are applied.
export const EMBEDDING_INDEX_SQL =
  "CREATE INDEX IF NOT EXISTS idx_document_chunks_embedding_hnsw " +
  "ON support.document_chunks USING hnsw (embedding vector_cosine_ops)";
