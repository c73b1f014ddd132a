import { z } from "zod";
import { ChatMessageSchema, ContentChunkSchema } from "@support-rag/shared";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

export const promptQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(15),
  threshold: z.coerce.number().min(0).max(1).default(0.25),
});

const HYPHENLESS_UUID = /^[0-9a-f]{32}$/i;

/** A chat id in canonical form: hyphenated, lowercase. Hyphenless ids are accepted. */
export const chatIdSchema = z
  .string()
  .trim()
  .transform((v) =>
    HYPHENLESS_UUID.test(v)
      ? `${v.slice(0, 8)}-${v.slice(8, 12)}-${v.slice(12, 16)}-${v.slice(16, 20)}-${v.slice(20)}`
      : v,
  )
  .pipe(z.string().uuid())
  .transform((v) => v.toLowerCase());

export const promptBodySchema = z.object({
  // Emptiness is checked by the handler so it can answer "No messages provided"
  messages: z.array(ChatMessageSchema),
  chat_id: chatIdSchema.optional(),
});

export const queryDocsSchema = z.object({
  q: z.string().min(1),
  limit: z.coerce.number().int().min(1).max(50).default(10),
  threshold: z.coerce.number().min(0).max(1).default(0.25),
  debug: booleanFlag,
});

export const updateContentSchema = z.object({
  content: z
    .array(ContentChunkSchema)
    .refine((chunks) => new Set(chunks.map((c) => c.id)).size === chunks.length, {
      message: "Chunk ids must be unique",
    }),
});

