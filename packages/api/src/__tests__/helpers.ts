/**
 * In-process stand-ins for the database-backed repositories and the
 * embedding service, shared by the API tests.
 */

import Fastify, { type FastifyBaseLogger } from "fastify";
import type { ContentChunk } from "@support-rag/shared";
import { loadConfig, type AppConfig } from "../config.js";
import type { DocResult, DocumentStore, SearchOptions, StoredChunk } from "../services/document-store.js";
import type { ChatMessageRepository, ChatTurn } from "../services/chat-logger.js";
import type { EmbeddingClient } from "../services/embedding-client.js";
import { contentHash } from "../services/rag-service.js";

// ─── Config / logging ────────────────────────────────────────────────

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ NODE_ENV: "test", JWT_SECRET: "test-secret", ...env });
}

export function silentLogger(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}

export const FIXED_NOW = () => new Date("2025-03-01T12:00:00Z");

// ─── Topic-based embeddings ──────────────────────────────────────────

export const TOPICS = {
  billing: 0,
  password: 1,
  api: 2,
  install: 3,
  other: 4,
} as const;

export type Topic = keyof typeof TOPICS;

export function topicEmbedding(topic: Topic, dims = 8): number[] {
  const vec = new Array<number>(dims).fill(0.01);
  vec[TOPICS[topic]] = 1.0;
  const norm = Math.sqrt(vec.reduce((s, v) => s + v * v, 0));
  return vec.map((v) => v / norm);
}

const TOPIC_KEYWORDS: Array<[Topic, RegExp]> = [
  ["billing", /\b(billing|invoice|refund)\b/i],
  ["password", /\b(password|login)\b/i],
  ["api", /\b(api|token)\b/i],
  ["install", /\b(install|setup|cli)\b/i],
];

export class TestEmbeddingClient implements EmbeddingClient {
  async embed(text: string): Promise<number[]> {
    const match = TOPIC_KEYWORDS.find(([, re]) => re.test(text));
    return topicEmbedding(match ? match[0] : "other");
  }
}

function cosine(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  return normA === 0 || normB === 0 ? 0 : dot / Math.sqrt(normA * normB);
}

// ─── In-memory document store ────────────────────────────────────────

export class InMemoryDocumentStore implements DocumentStore {
  readonly chunks = new Map<string, StoredChunk>();

  async search(embedding: number[], options: SearchOptions): Promise<DocResult[]> {
    return [...this.chunks.values()]
      .map((c) => ({
        id: c.id,
        title: c.title,
        slug: c.slug,
        content: c.content,
        similarity: cosine(embedding, c.embedding),
      }))
      .filter((d) => d.similarity >= options.threshold)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, options.limit);
  }

  async listContentHashes(): Promise<Map<string, string>> {
    return new Map([...this.chunks.values()].map((c) => [c.id, c.contentHash]));
  }

  async upsert(chunk: StoredChunk): Promise<void> {
    this.chunks.set(chunk.id, { ...chunk });
  }

  async deleteExcept(ids: readonly string[]): Promise<number> {
    const keep = new Set(ids);
    let removed = 0;
    for (const id of [...this.chunks.keys()]) {
      if (!keep.has(id)) {
        this.chunks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /** Insert chunks directly, as if a previous update had indexed them. */
  seed(entries: Array<{ chunk: ContentChunk; topic: Topic }>): this {
    for (const { chunk, topic } of entries) {
      this.chunks.set(chunk.id, {
        id: chunk.id,
        title: chunk.title,
        slug: chunk.slug ?? null,
        content: chunk.content,
        contentHash: contentHash(chunk),
        embedding: topicEmbedding(topic),
        metadata: chunk.metadata ?? null,
      });
    }
    return this;
  }
}

// ─── In-memory chat repository ───────────────────────────────────────

export class InMemoryChatMessageRepository implements ChatMessageRepository {
  readonly turns: ChatTurn[] = [];

  async maxSequence(chatId: string): Promise<number | null> {
    const seqs = this.turns.filter((t) => t.chatId === chatId).map((t) => t.seq);
    return seqs.length > 0 ? Math.max(...seqs) : null;
  }

  async insert(turn: ChatTurn): Promise<void> {
    if (this.turns.some((t) => t.chatId === turn.chatId && t.seq === turn.seq)) {
      throw new Error('duplicate key value violates unique constraint "uq_chat_messages_chat_seq"');
    }
    this.turns.push({ ...turn });
  }
}

// ─── Seed data ───────────────────────────────────────────────────────

export const BILLING_CHUNK: ContentChunk = {
  id: "billing-1",
  title: "Updating billing details",
  slug: "billing/update",
  content: "Open Settings > Billing to change the card on file.",
};

export const PASSWORD_CHUNK: ContentChunk = {
  id: "password-1",
  title: "Resetting your password",
  slug: "account/password-reset",
  content: "Use the Forgot password link on the sign-in page.",
};

export const API_CHUNK: ContentChunk = {
  id: "api-1",
  title: "API tokens",
  slug: null,
  content: "Create tokens under Settings > API.",
};

export const INSTALL_CHUNK: ContentChunk = {
  id: "install-1",
  title: "Installing the CLI",
  slug: "cli/install",
  content: "Install the CLI with npm. ".repeat(6).trim(),
};

export function seededStore(): InMemoryDocumentStore {
  return new InMemoryDocumentStore().seed([
    { chunk: BILLING_CHUNK, topic: "billing" },
    { chunk: PASSWORD_CHUNK, topic: "password" },
    { chunk: API_CHUNK, topic: "api" },
    { chunk: INSTALL_CHUNK, topic: "install" },
  ]);
}

export const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
