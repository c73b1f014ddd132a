import { z } from "zod";

export const ChatRole = z.enum(["user", "assistant"]);
export type ChatRole = z.infer<typeof ChatRole>;

export const ChatMessageSchema = z.object({
  role: ChatRole,
  content: z.string().min(1),
});
export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export const ContentChunkSchema = z.object({
  id: z.string().min(1).max(255),
  title: z.string().min(1),
  slug: z.string().min(1).max(500).nullish(),
  content: z.string().min(1),
  metadata: z.record(z.unknown()).optional(),
});
export type ContentChunk = z.infer<typeof ContentChunkSchema>;
