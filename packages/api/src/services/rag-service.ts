/**
 * RAG (Retrieval-Augmented Generation) service. Answers support questions
 * from documentation chunks using vector search + a streaming LLM.
 */

import { createHash } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import {
  SUPPORT_ASSISTANT_TEMPLATE,
  renderSupportPrompt,
  type ChatMessage,
  type ContentChunk,
  type MissingValuePolicy,
  type PromptTemplate,
} from "@support-rag/shared";
import type { DocResult, DocumentStore, SearchOptions } from "./document-store.js";
import type { EmbeddingClient } from "./embedding-client.js";
import type { LLMChatOptions, LLMProvider } from "./llm-provider.js";

// ─── Types ───────────────────────────────────────────────────────────

export interface RAGServiceOptions {
  logger: FastifyBaseLogger;
  template?: PromptTemplate;
  onMissing?: MissingValuePolicy;
  /** Base URL that chunk slugs are resolved against when building links. */
  docsBaseUrl?: string;
  maxContextChars?: number;
  chatOptions?: LLMChatOptions;
  now?: () => Date;
}

export interface UpdateStats {
  processed: number;
  updated: number;
  skipped: number;
  errors: number;
  deleted: number;
}

export const NO_CONTEXT = "No relevant documentation was found.";
const DOC_SEPARATOR = "\n\n---\n\n";

export function contentHash(chunk: ContentChunk): string {
  return createHash("sha256")
    .update(
      JSON.stringify([chunk.title, chunk.slug ?? null, chunk.content, chunk.metadata ?? null]),
    )
    .digest("hex");
}

function truncationNote(dropped: number): string {
  return `(${dropped} more ${dropped === 1 ? "document" : "documents"} truncated)`;
}

// ─── Service ─────────────────────────────────────────────────────────

export class RAGService {
  private readonly log: FastifyBaseLogger;
  private readonly template: PromptTemplate;
  private readonly onMissing: MissingValuePolicy;
  private readonly maxContextChars: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: DocumentStore,
    private readonly embeddings: EmbeddingClient,
    private readonly llm: LLMProvider,
    private readonly options: RAGServiceOptions,
  ) {
    this.log = options.logger;
    this.template = options.template ?? SUPPORT_ASSISTANT_TEMPLATE;
    this.onMissing = options.onMissing ?? "error";
    this.maxContextChars = options.maxContextChars ?? 12_000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Embed the query and return the matching chunks, best first.
   */
  async getRelevantDocuments(query: string, options: SearchOptions): Promise<DocResult[]> {
    const embedding = await this.embeddings.embed(query);
    return this.store.search(embedding, options);
  }

  /**
   * Format retrieved chunks into the context block injected into the
   * system prompt. The result, truncation note included, stays within
   * `maxContextChars`.
   */
  buildContext(docs: DocResult[]): string {
    if (docs.length === 0) return NO_CONTEXT;

    const blocks = docs.map((doc) => this.formatDoc(doc));
    const full = blocks.join(DOC_SEPARATOR);
    if (full.length <= this.maxContextChars) return full;

    // Drop trailing documents until the kept ones and the note fit
    for (let kept = blocks.length - 1; kept > 0; kept--) {
      const text = `${blocks.slice(0, kept).join(DOC_SEPARATOR)}\n\n${truncationNote(blocks.length - kept)}`;
      if (text.length <= this.maxContextChars) return text;
    }
    return truncationNote(blocks.length);
  }

  buildSystemPrompt(docs: DocResult[]): string {
    return renderSupportPrompt(
      { year: this.now().getFullYear(), context: this.buildContext(docs) },
      { onMissing: this.onMissing },
      this.template,
    );
  }

  /**
   * Stream the assistant reply for a conversation. The system prompt is
   * rendered before the stream is returned, so template errors are thrown
   * to the caller rather than mid-stream.
   */
  streamChatResponse(messages: ChatMessage[], relevantDocs: DocResult[]): AsyncIterable<string> {
    const systemPrompt = this.buildSystemPrompt(relevantDocs);
    return this.llm.streamChat(
      [{ role: "system", content: systemPrompt }, ...messages],
      this.options.chatOptions,
    );
  }

  /**
   * Replace the indexed documentation with `chunks`. Unchanged chunks are
   * skipped; chunks missing from the request are deleted.
   */
  async updateContent(chunks: ContentChunk[]): Promise<UpdateStats> {
    const existing = await this.store.listContentHashes();
    const stats: UpdateStats = { processed: 0, updated: 0, skipped: 0, errors: 0, deleted: 0 };

    for (const chunk of chunks) {
      stats.processed++;
      const hash = contentHash(chunk);

      if (existing.get(chunk.id) === hash) {
        stats.skipped++;
        continue;
      }

      try {
        const embedding = await this.embeddings.embed(`${chunk.title}\n\n${chunk.content}`);
        await this.store.upsert({
          id: chunk.id,
          title: chunk.title,
          slug: chunk.slug ?? null,
          content: chunk.content,
          contentHash: hash,
          embedding,
          metadata: chunk.metadata ?? null,
        });
        stats.updated++;
      } catch (err) {
        stats.errors++;
        this.log.error({ err, chunkId: chunk.id }, "Failed to update content chunk");
      }
    }

    stats.deleted = await this.store.deleteExcept(chunks.map((c) => c.id));
    this.log.info(stats, "Content update finished");
    return stats;
  }

  // ── Internals ────────────────────────────────────────────────────

  private formatDoc(doc: DocResult): string {
    const lines = [`### ${doc.title}`];
    const url = this.docUrl(doc.slug);
    if (url) lines.push(`URL: ${url}`);
    lines.push("", doc.content);
    return lines.join("\n");
  }

  private docUrl(slug: string | null): string | null {
    if (!slug) return null;
    const path = slug.replace(/^\/+/, "");
    const base = this.options.docsBaseUrl?.replace(/\/+$/, "");
    return base ? `${base}/${path}` : `/${path}`;
  }
}
