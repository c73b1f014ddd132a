import { randomUUID } from "node:crypto";
import { eq, max } from "drizzle-orm";
import type { ChatRole } from "@support-rag/shared";
import type { Database } from "../db/index.js";
import { chatMessages } from "../db/schema.js";

// ─── Types ───────────────────────────────────────────────────────────

export interface ChatTurn {
  chatId: string;
  role: ChatRole;
  seq: number;
  content: string;
  contextSlugs?: string[] | null;
}

export interface ChatMessageRepository {
  /** Highest stored sequence number for a chat, or null when it has none. */
  maxSequence(chatId: string): Promise<number | null>;
  insert(turn: ChatTurn): Promise<void>;
}

// ─── Postgres implementation ─────────────────────────────────────────

export class PgChatMessageRepository implements ChatMessageRepository {
  constructor(private readonly db: Database) {}

  async maxSequence(chatId: string): Promise<number | null> {
    const [row] = await this.db
      .select({ lastSeq: max(chatMessages.seq) })
      .from(chatMessages)
      .where(eq(chatMessages.chatId, chatId));
    return row?.lastSeq ?? null;
  }

  async insert(turn: ChatTurn): Promise<void> {
    await this.db.insert(chatMessages).values({
      chatId: turn.chatId,
      seq: turn.seq,
      role: turn.role,
      content: turn.content,
      contextSlugs: turn.contextSlugs ?? null,
    });
  }
}

// ─── ChatLogger ──────────────────────────────────────────────────────

/** Persists chat turns with a per-chat sequence number. */
export class ChatLogger {
  constructor(private readonly repository: ChatMessageRepository) {}

  ensureChatId(chatId?: string | null): string {
    return chatId ?? randomUUID();
  }

  async nextSequence(chatId: string): Promise<number> {
    const lastSeq = await this.repository.maxSequence(chatId);
    return (lastSeq ?? 0) + 1;
  }

  async logMessage(turn: ChatTurn): Promise<void> {
    await this.repository.insert(turn);
  }
}
