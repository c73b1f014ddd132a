import { Readable } from "node:stream";
import type { FastifyInstance } from "fastify";
import type { RAGService } from "../services/rag-service.js";
import type { ChatLogger } from "../services/chat-logger.js";
import { badRequest } from "../lib/errors.js";
import { requireRole } from "../middleware/auth.js";
import {
  chatIdSchema,
  promptBodySchema,
  promptQuerySchema,
  queryDocsSchema,
  updateContentSchema,
} from "../schemas/rag.schema.js";

interface RouteOptions {
  ragService: RAGService;
  chatLogger: ChatLogger;
}

// ─── Helpers ─────────────────────────────────────────────────────────

function parseChatIdHeader(header: string | string[] | undefined): string | undefined {
  const value = (Array.isArray(header) ? header[0] : header)?.trim();
  // An empty header starts a new chat
  if (!value) return undefined;
  const parsed = chatIdSchema.safeParse(value);
  if (!parsed.success) throw badRequest("Invalid X-Chat-Id header");
  return parsed.data;
}

function truncate(text: string | null, length: number): string | null {
  if (!text) return null;
  return text.length <= length ? text : `${text.slice(0, length)}...`;
}

/**
 * Pass chunks through while buffering them; `onEnd` receives the trimmed
 * full text once the source is exhausted or the consumer stops reading.
 */
async function* relay(
  source: AsyncIterable<string>,
  onEnd: (text: string) => Promise<void>,
): AsyncGenerator<string> {
  const parts: string[] = [];
  try {
    for await (const chunk of source) {
      if (chunk) {
        parts.push(chunk);
        yield chunk;
      }
    }
  } finally {
    await onEnd(parts.join("").trim());
  }
}

// ─── Routes ──────────────────────────────────────────────────────────

export default async function ragRoutes(app: FastifyInstance, opts: RouteOptions) {
  const { ragService, chatLogger } = opts;

  // ─── POST /prompt ────────────────────────────────────────────────

  app.post("/prompt", async (request, reply) => {
    const query = promptQuerySchema.parse(request.query);
    const body = promptBodySchema.parse(request.body);

    const latest = body.messages.at(-1);
    if (!latest) throw badRequest("No messages provided");

    request.log.debug({ messages: body.messages.length }, "Received prompt request");

    // Body chat_id wins over the header; neither means a new chat
    const chatId = chatLogger.ensureChatId(
      body.chat_id ?? parseChatIdHeader(request.headers["x-chat-id"]),
    );

    const relevantDocs = await ragService.getRelevantDocuments(latest.content, query);
    const contextSlugs = relevantDocs.flatMap((doc) => (doc.slug ? [doc.slug] : []));
    const chunks = ragService.streamChatResponse(body.messages, relevantDocs);

    const seq = await chatLogger.nextSequence(chatId);
    await chatLogger.logMessage({
      chatId,
      role: "user",
      seq,
      content: latest.content,
      contextSlugs,
    });

    const recordReply = async (text: string) => {
      if (!text) return;
      try {
        await chatLogger.logMessage({
          chatId,
          role: "assistant",
          seq: seq + 1,
          content: text,
          contextSlugs,
        });
      } catch (err) {
        request.log.error({ err, chatId }, "Failed to log assistant message");
      }
    };

    return reply
      .header("X-Chat-Id", chatId)
      .type("text/plain; charset=utf-8")
      .send(Readable.from(relay(chunks, recordReply)));
  });

  // ─── GET /query ──────────────────────────────────────────────────

  app.get("/query", async (request) => {
    const params = queryDocsSchema.parse(request.query);

    const results = await ragService.getRelevantDocuments(params.q, {
      limit: params.limit,
      threshold: params.threshold,
    });

    if (!params.debug) return results;

    return results.map((doc) => ({
      id: doc.id,
      title: doc.title,
      content: truncate(doc.content, 100),
      similarity: doc.similarity,
    }));
  });

  // ─── POST /update ────────────────────────────────────────────────

  app.post(
    "/update",
    { preHandler: [app.authenticate, requireRole("admin", "editor")] },
    async (request) => {
      const body = updateContentSchema.parse(request.body);
      request.log.info({ chunks: body.content.length }, "Processing content update");
      return ragService.updateContent(body.content);
    },
  );
}
