import { describe, it, expect, beforeEach } from "vitest";
import { ChatLogger } from "../chat-logger.js";
import { InMemoryChatMessageRepository, UUID_RE } from "../../__tests__/helpers.js";

const CHAT_ID = "6f1c2a4e-3b7d-4c9a-8e21-0d5f6a7b8c9d";

let repository: InMemoryChatMessageRepository;
let logger: ChatLogger;

beforeEach(() => {
  repository = new InMemoryChatMessageRepository();
  logger = new ChatLogger(repository);
});

describe("ChatLogger.ensureChatId", () => {
  it("keeps a supplied chat id", () => {
    expect(logger.ensureChatId(CHAT_ID)).toBe(CHAT_ID);
  });

  it("creates a new UUID when none is supplied", () => {
    const first = logger.ensureChatId();
    const second = logger.ensureChatId(null);

    expect(first).toMatch(UUID_RE);
    expect(second).toMatch(UUID_RE);
    expect(first).not.toBe(second);
  });
});

describe("ChatLogger.nextSequence", () => {
  it("starts a new chat at 1", async () => {
    expect(await logger.nextSequence(CHAT_ID)).toBe(1);
  });

  it("continues after the highest stored sequence", async () => {
    await logger.logMessage({ chatId: CHAT_ID, role: "user", seq: 1, content: "Hi" });
    await logger.logMessage({ chatId: CHAT_ID, role: "assistant", seq: 2, content: "Hello" });
    await logger.logMessage({ chatId: "other-chat", role: "user", seq: 7, content: "Hey" });

    expect(await logger.nextSequence(CHAT_ID)).toBe(3);
    expect(await logger.nextSequence("other-chat")).toBe(8);
  });
});

describe("ChatLogger.logMessage", () => {
  it("stores the turn with its context slugs", async () => {
    await logger.logMessage({
      chatId: CHAT_ID,
      role: "user",
      seq: 1,
      content: "How do I change my card?",
      contextSlugs: ["billing/update"],
    });

    expect(repository.turns).toEqual([
      {
        chatId: CHAT_ID,
        role: "user",
        seq: 1,
        content: "How do I change my card?",
        contextSlugs: ["billing/update"],
      },
    ]);
  });

  it("propagates repository failures", async () => {
    await logger.logMessage({ chatId: CHAT_ID, role: "user", seq: 1, content: "Hi" });
    await expect(
      logger.logMessage({ chatId: CHAT_ID, role: "user", seq: 1, content: "Again" }),
    ).rejects.toThrow("uq_chat_messages_chat_seq");
  });
});
