/**
 * Embedding clients: OpenAI for production, a deterministic hashed
 * bag-of-words for local development.
 */

import OpenAI from "openai";
import type { AppConfig } from "../config.js";

export interface EmbeddingClient {
  embed(text: string): Promise<number[]>;
}

// ─── OpenAI ──────────────────────────────────────────────────────────

export class OpenAIEmbeddingClient implements EmbeddingClient {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly dimensions: number,
  ) {}

  async embed(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: text,
      dimensions: this.dimensions,
      encoding_format: "float",
    });

    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error(`No embedding returned by ${this.model}`);
    }
    return embedding;
  }
}

// ─── Mock (local dev) ────────────────────────────────────────────────

export class MockEmbeddingClient implements EmbeddingClient {
  constructor(private readonly dimensions: number) {}

  async embed(text: string): Promise<number[]> {
    const vec = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const slot = fnv1a(token) % this.dimensions;
      vec[slot] = (vec[slot] ?? 0) + 1;
    }
    const norm = Math.sqrt(vec.reduce((s, v) => s + v * v, 0));
    return norm === 0 ? vec : vec.map((v) => v / norm);
  }
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

// ─── Factory ─────────────────────────────────────────────────────────

export function createEmbeddingClient(config: AppConfig): EmbeddingClient {
  switch (config.LLM_PROVIDER) {
    case "openai":
      return new OpenAIEmbeddingClient(
        new OpenAI({ apiKey: config.OPENAI_API_KEY }),
        config.OPENAI_EMBEDDING_MODEL,
        config.EMBEDDING_DIMENSIONS,
      );
    case "mock":
    default:
      return new MockEmbeddingClient(config.EMBEDDING_DIMENSIONS);
  }
}
