export * from "./prompt/index.js";
export {
  ChatRole,
  ChatMessageSchema,
  ContentChunkSchema,
} from "./types.js";
export type { ChatMessage, ContentChunk } from "./types.js";
