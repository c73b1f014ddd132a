/**
 * Document store: semantic search over documentation chunks using
 * pgvector cosine similarity, plus the writes the content update needs.
 */

import { notInArray, sql } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { documentChunks, toVectorLiteral } from "../db/schema.js";

// ─── Types ───────────────────────────────────────────────────────────

export interface SearchOptions {
  limit: number;
  threshold: number;
}

export interface DocResult {
  id: string;
  title: string;
  slug: string | null;
  content: string;
  similarity: number;
}

export interface StoredChunk {
  id: string;
  title: string;
  slug: string | null;
  content: string;
  contentHash: string;
  embedding: number[];
  metadata: Record<string, unknown> | null;
}

export interface DocumentStore {
  /** Chunks with similarity >= threshold, best match first. */
  search(embedding: number[], options: SearchOptions): Promise<DocResult[]>;
  listContentHashes(): Promise<Map<string, string>>;
  upsert(chunk: StoredChunk): Promise<void>;
  /** Delete every chunk whose id is not listed. Returns the number removed. */
  deleteExcept(ids: readonly string[]): Promise<number>;
}

// ─── Postgres implementation ─────────────────────────────────────────

export class PgDocumentStore implements DocumentStore {
  constructor(private readonly db: Database) {}

  async search(embedding: number[], options: SearchOptions): Promise<DocResult[]> {
    const distance = sql`${documentChunks.embedding} <=> ${toVectorLiteral(embedding)}::vector`;
    const similarity = sql<number>`1 - (${distance})`.mapWith(Number);

    return this.db
      .select({
        id: documentChunks.id,
        title: documentChunks.title,
        slug: documentChunks.slug,
        content: documentChunks.content,
        similarity,
      })
      .from(documentChunks)
      .where(sql`1 - (${distance}) >= ${options.threshold}`)
      .orderBy(distance)
      .limit(options.limit);
  }

  async listContentHashes(): Promise<Map<string, string>> {
    const rows = await this.db
      .select({ id: documentChunks.id, contentHash: documentChunks.contentHash })
      .from(documentChunks);
    return new Map(rows.map((r) => [r.id, r.contentHash]));
  }

  async upsert(chunk: StoredChunk): Promise<void> {
    const values = {
      title: chunk.title,
      slug: chunk.slug,
      content: chunk.content,
      contentHash: chunk.contentHash,
      embedding: chunk.embedding,
      metadataJson: chunk.metadata,
      updatedAt: new Date(),
    };

    await this.db
      .insert(documentChunks)
      .values({ id: chunk.id, ...values })
      .onConflictDoUpdate({ target: documentChunks.id, set: values });
  }

  async deleteExcept(ids: readonly string[]): Promise<number> {
    const removed =
      ids.length > 0
        ? await this.db
            .delete(documentChunks)
            .where(notInArray(documentChunks.id, [...ids]))
            .returning({ id: documentChunks.id })
        : await this.db.delete(documentChunks).returning({ id: documentChunks.id });
    return removed.length;
  }
}
