// ============================================
// API Module — REST routes for chat and ingestion
// ============================================

import { Router } from "express";
import type { Assistant } from "../app/assistant.js";
import type { IngestionService } from "../indexer/index.js";
import {
  createChatHandler,
  createClearSessionHandler,
  createHealthHandler,
  createIngestHandler,
} from "./handler.js";
import { chatRequestSchema, ingestRequestSchema, validateBody } from "./middleware.js";

export interface ApiDeps {
  assistant: Assistant;
  ingestion: IngestionService;
  lexical: { readonly lexicalIndexSize: number };
  version: string;
}

export function createApiRouter(deps: ApiDeps): Router {
  const router = Router();

  router.get("/health", createHealthHandler(deps.version, deps.lexical));
  router.post("/chat", validateBody(chatRequestSchema), createChatHandler(deps.assistant));
  router.delete("/chat/:sessionId", createClearSessionHandler(deps.assistant));
  router.post("/ingest", validateBody(ingestRequestSchema), createIngestHandler(deps.ingestion));

  return router;
}

export {
  addRequestId,
  corsMiddleware,
  validateBody,
  chatRequestSchema,
  ingestRequestSchema,
  type ChatRequest,
  type IngestRequest,
} from "./middleware.js";

export type { ApiErrorResponse, ChatResponse, HealthResponse, IngestResponse } from "./handler.js";
