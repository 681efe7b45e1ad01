import "dotenv/config";
import express from "express";
import { TurnOrchestrator } from "./agent/orchestrator.js";
import { addRequestId, corsMiddleware, createApiRouter } from "./api/index.js";
import { Assistant } from "./app/assistant.js";
import { loadConfig } from "./config/env.js";
import { SupabaseBookingRepository } from "./db/bookings.js";
import { SupabaseChunkRepository } from "./db/chunks.js";
import { createSupabaseClient } from "./db/supabase.js";
import { SupabaseVectorStore } from "./db/vectors.js";
import { IngestionService } from "./indexer/index.js";
import { logger } from "./lib/logger.js";
import { OpenAITextGenerator, createOpenAIClient } from "./llm/client.js";
import { ConversationMemory } from "./memory/conversationMemory.js";
import { RedisSessionStore } from "./memory/redisSessionStore.js";
import { InMemorySessionStore, type SessionStore } from "./memory/sessionStore.js";
import { OpenAIEmbedder } from "./retrieval/embeddings.js";
import { LexicalIndex } from "./retrieval/lexicalIndex.js";
import { HttpCrossEncoder, LlmCrossEncoder, type CrossEncoder } from "./retrieval/rerank.js";
import { RetrievalEngine } from "./retrieval/retrieve.js";
import { VectorIndexClient } from "./retrieval/vectorIndex.js";

// ============================================
// Composition root
// ============================================

const VERSION = process.env["npm_package_version"] ?? "1.0.0";

const config = loadConfig();

const openai = createOpenAIClient(config.openai.apiKey);
const supabase = createSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);

const generator = new OpenAITextGenerator(openai, { model: config.openai.chatModel });
const embedder = new OpenAIEmbedder(openai, config.openai.embeddingModel, config.openai.embeddingDimensions);

const chunkRepository = new SupabaseChunkRepository(supabase);
const vectorIndex = new VectorIndexClient(embedder, new SupabaseVectorStore(supabase));

const crossEncoder: CrossEncoder = config.crossEncoderUrl
  ? new HttpCrossEncoder(config.crossEncoderUrl)
  : new LlmCrossEncoder(new OpenAITextGenerator(openai, { model: config.openai.chatModel, temperature: 0, maxTokens: 200 }));

const retrieval = new RetrievalEngine({
  lexicalIndex: new LexicalIndex(),
  vectorIndex,
  chunks: chunkRepository,
  crossEncoder,
  defaults: {
    kLexical: config.retrieval.topKLexical,
    kVector: config.retrieval.topKDense,
    kFinal: config.retrieval.topKFinal,
  },
});

const redisStore = config.memory.redisUrl ? RedisSessionStore.connect(config.memory.redisUrl) : null;
const sessionStore: SessionStore = redisStore ?? new InMemorySessionStore();

const memory = new ConversationMemory(sessionStore, {
  maxTurns: config.memory.maxTurns,
  ttlSeconds: config.memory.ttlSeconds,
});

const orchestrator = new TurnOrchestrator({
  retriever: retrieval,
  generator,
  bookings: new SupabaseBookingRepository(supabase),
  historyWindow: config.historyWindow,
  maxContextChars: config.retrieval.maxContextChars,
});

const assistant = new Assistant(orchestrator, memory);
const ingestion = new IngestionService(chunkRepository, vectorIndex, retrieval);

// ============================================
// Express Routes
// ============================================

const app = express();

app.use(addRequestId);
app.use(corsMiddleware(config.allowedOrigins));
app.use(express.json({ limit: "5mb" }));
app.use("/api", createApiRouter({ assistant, ingestion, lexical: retrieval, version: VERSION }));

// ============================================
// Startup
// ============================================

logger.info("Starting document assistant", {
  stage: "startup",
  port: config.port,
  sessionStore: redisStore ? "redis" : "memory",
  crossEncoder: config.crossEncoderUrl ? "http" : "llm",
});

retrieval.rebuildLexicalIndex().catch((err: unknown) => {
  logger.warn("Initial lexical index build failed; retrying on first query", { stage: "startup", error: err });
});

const server = app.listen(config.port, () => {
  logger.info("Server listening", { stage: "startup", port: config.port });
});

function shutdown(signal: string): void {
  logger.info("Shutting down", { stage: "startup", signal });
  server.close(() => {
    if (!redisStore) return;
    redisStore.close().catch((err: unknown) => {
      logger.warn("Redis close failed", { stage: "startup", error: err });
    });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
