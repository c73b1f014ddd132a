import { pathToFileURL } from "node:url";
import Fastify from "fastify";
import cors from "@fastify/cors";
import { SUPPORT_ASSISTANT_TEMPLATE, type PromptTemplate } from "@support-rag/shared";
import { loadConfig, type AppConfig } from "./config.js";
import { createDatabase, type DatabaseConnection } from "./db/index.js";
import { errorHandlerPlugin } from "./lib/errors.js";
import { loadPromptTemplate } from "./lib/prompt-template.js";
import { authPlugin } from "./middleware/auth.js";
import { PgDocumentStore, type DocumentStore } from "./services/document-store.js";
import {
  ChatLogger,
  PgChatMessageRepository,
  type ChatMessageRepository,
} from "./services/chat-logger.js";
import { createEmbeddingClient, type EmbeddingClient } from "./services/embedding-client.js";
import { createLLMProvider, type LLMProvider } from "./services/llm-provider.js";
import { RAGService } from "./services/rag-service.js";
import ragRoutes from "./routes/rag.js";

export interface BuildAppOptions {
  config?: AppConfig;
  documentStore?: DocumentStore;
  chatMessages?: ChatMessageRepository;
  embeddingClient?: EmbeddingClient;
  llmProvider?: LLMProvider;
  promptTemplate?: PromptTemplate;
  now?: () => Date;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: config.NODE_ENV === "test" ? false : { level: config.LOG_LEVEL },
  });

  // The postgres client is only created when a store is not supplied; it
  // opens its first connection on the first query
  let connection: DatabaseConnection | undefined;
  const db = () => (connection ??= createDatabase(config.DATABASE_URL)).db;

  const documentStore = options.documentStore ?? new PgDocumentStore(db());
  const chatLogger = new ChatLogger(options.chatMessages ?? new PgChatMessageRepository(db()));

  const template =
    options.promptTemplate ??
    (config.PROMPT_TEMPLATE_PATH
      ? await loadPromptTemplate(config.PROMPT_TEMPLATE_PATH)
      : SUPPORT_ASSISTANT_TEMPLATE);

  const ragService = new RAGService(
    documentStore,
    options.embeddingClient ?? createEmbeddingClient(config),
    options.llmProvider ?? createLLMProvider(config),
    {
      logger: app.log.child({ module: "rag-service" }),
      template,
      onMissing: config.PROMPT_MISSING_VALUE,
      docsBaseUrl: config.DOCS_BASE_URL,
      maxContextChars: config.RAG_MAX_CONTEXT_CHARS,
      now: options.now,
    },
  );

  app.addHook("onClose", async () => {
    if (connection) await connection.client.end();
  });

  await app.register(cors, {
    origin: config.CORS_ORIGINS,
    credentials: true,
    exposedHeaders: ["X-Chat-Id"],
  });

  app.get("/health", async () => {
    return { status: "ok", service: "support-rag-api", timestamp: new Date().toISOString() };
  });

  // Error handler & auth
  await app.register(errorHandlerPlugin);
  await app.register(authPlugin, { secret: config.JWT_SECRET });

  // API routes under /api/v1 prefix
  await app.register(
    async (api) => {
      await api.register(ragRoutes, { ragService, chatLogger });
    },
    { prefix: "/api/v1" },
  );

  return app;
}

async function start() {
  const config = loadConfig();
  const app = await buildApp({ config });

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, "Shutting down");
    await app.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  try {
    await app.listen({ port: config.PORT, host: config.HOST });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

// Only start when run directly (not when imported in tests)
const entry = process.argv[1];
const isMainModule = entry !== undefined && import.meta.url === pathToFileURL(entry).href;

if (isMainModule) {
  start().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
