import { describe, it, expect } from "vitest";
import {
  MockEmbeddingClient,
  OpenAIEmbeddingClient,
  createEmbeddingClient,
} from "../embedding-client.js";
import { testConfig } from "../../__tests__/helpers.js";

function dot(a: number[], b: number[]): number {
  return a.reduce((sum, v, i) => sum + v * (b[i] ?? 0), 0);
}

describe("MockEmbeddingClient", () => {
  const client = new MockEmbeddingClient(64);

  it("returns unit vectors of the configured size", async () => {
    const vec = await client.embed("Reset your password from the sign-in page");
    expect(vec).toHaveLength(64);
    expect(dot(vec, vec)).toBeCloseTo(1, 10);
  });

  it("is deterministic and ignores case and punctuation", async () => {
    expect(await client.embed("Billing, invoices!")).toEqual(await client.embed("billing invoices"));
  });

  it("scores shared words above unrelated text", async () => {
    const query = await client.embed("change billing card");
    const related = await client.embed("billing card settings");
    const unrelated = await client.embed("install the command line tool");
    expect(dot(query, related)).toBeGreaterThan(dot(query, unrelated));
  });

  it("returns a zero vector for text without words", async () => {
    expect(await client.embed("  ...  ")).toEqual(new Array<number>(64).fill(0));
  });
});

describe("createEmbeddingClient", () => {
  it("uses the mock client by default", () => {
    expect(createEmbeddingClient(testConfig())).toBeInstanceOf(MockEmbeddingClient);
  });

  it("uses OpenAI when configured", () => {
    const client = createEmbeddingClient(
      testConfig({ LLM_PROVIDER: "openai", OPENAI_API_KEY: "test-key" }),
    );
    expect(client).toBeInstanceOf(OpenAIEmbeddingClient);
  });
});
