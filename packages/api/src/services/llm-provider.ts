/**
 * LLM provider abstraction: mock for local dev, OpenAI for production.
 */

import OpenAI from "openai";
import type { AppConfig } from "../config.js";

// ─── Interfaces ──────────────────────────────────────────────────────

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LLMChatOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface LLMProvider {
  streamChat(messages: LLMMessage[], options?: LLMChatOptions): AsyncIterable<string>;
  readonly providerName: string;
}

// ─── Mock provider (local dev / testing) ─────────────────────────────

export const MOCK_REPLY =
  "This is a mock support response. Configure LLM_PROVIDER=openai for real answers.";

export class MockLLMProvider implements LLMProvider {
  readonly providerName = "mock";

  constructor(private readonly reply: string = MOCK_REPLY) {}

  async *streamChat(
    _messages: LLMMessage[],
    _options?: LLMChatOptions,
  ): AsyncGenerator<string> {
    // Word-sized chunks, whitespace kept, so the joined stream equals the reply
    for (const chunk of this.reply.match(/\S+\s*/g) ?? []) {
      yield chunk;
    }
  }
}

// ─── OpenAI provider ─────────────────────────────────────────────────

function toOpenAIMessage(message: LLMMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

export class OpenAILLMProvider implements LLMProvider {
  readonly providerName = "openai";

  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async *streamChat(
    messages: LLMMessage[],
    options: LLMChatOptions = {},
  ): AsyncGenerator<string> {
    const stream = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map(toOpenAIMessage),
      stream: true,
      temperature: options.temperature ?? 0.2,
      max_tokens: options.maxTokens,
    });

    for await (const chunk of stream) {
      const content = chunk.choices[0]?.delta?.content;
      if (content) yield content;
    }
  }
}

// ─── Factory ─────────────────────────────────────────────────────────

export function createLLMProvider(config: AppConfig): LLMProvider {
  switch (config.LLM_PROVIDER) {
    case "openai":
      return new OpenAILLMProvider(
        new OpenAI({ apiKey: config.OPENAI_API_KEY }),
        config.OPENAI_CHAT_MODEL,
      );
    case "mock":
    default:
      return new MockLLMProvider();
  }
}
