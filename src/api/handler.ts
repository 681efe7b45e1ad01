// ============================================
// API Handlers — chat, session reset, ingestion, health
// ============================================

import crypto from "node:crypto";
import type { Request, Response } from "express";
import type { Assistant } from "../app/assistant.js";
import type { IngestionService } from "../indexer/index.js";
import { getUserMessage, wrapError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { IngestResult, TurnResult } from "../types/index.js";
import type { ChatRequest, IngestRequest } from "./middleware.js";

// ============================================
// Types
// ============================================

export type ChatResponse = TurnResult;

export interface IngestResponse {
  results: IngestResult[];
}

export interface ApiErrorResponse {
  error: string;
  message: string;
  requestId?: string;
  details?: unknown;
}

export interface HealthResponse {
  status: "ok" | "degraded";
  version: string;
  timestamp: string;
  lexicalIndexSize: number;
}

function requestIdOf(req: Request): string {
  return req.requestId ?? crypto.randomUUID().slice(0, 8);
}

/** Log the failure and send a generic error; internal details stay in the log */
function sendError(res: Response, err: unknown, requestId: string, message: string): void {
  const appError = wrapError(err, requestId);

  logger.error(message, {
    stage: "api",
    requestId,
    errorCode: appError.code,
    error: err,
  });

  const errorResponse: ApiErrorResponse = {
    error: "INTERNAL_ERROR",
    message: getUserMessage(appError),
    requestId,
  };
  res.status(500).json(errorResponse);
}

// ============================================
// Handlers
// ============================================

/**
 * POST /api/chat — one conversational turn.
 */
export function createChatHandler(assistant: Assistant) {
  return async (req: Request, res: Response): Promise<void> => {
    const requestId = requestIdOf(req);
    const startTime = Date.now();
    // Validated by chatRequestSchema
    const body: ChatRequest = req.body;
    const { sessionId, message } = body;

    logger.info("Chat request received", {
      stage: "api",
      requestId,
      sessionId,
      messageLength: message.length,
    });

    try {
      const result = await assistant.chat(sessionId, message, requestId);

      logger.info("Chat request completed", {
        stage: "api",
        requestId,
        sessionId,
        bookingCreated: result.bookingCreated,
        sources: result.sources.length,
        latencyMs: Date.now() - startTime,
      });

      const response: ChatResponse = result;
      res.status(200).json(response);
    } catch (err) {
      sendError(res, err, requestId, "Chat request failed");
    }
  };
}

/**
 * DELETE /api/chat/:sessionId — forget a session's history.
 */
export function createClearSessionHandler(assistant: Assistant) {
  return async (req: Request, res: Response): Promise<void> => {
    const requestId = requestIdOf(req);
    const sessionId = req.params["sessionId"] ?? "";

    try {
      await assistant.clearSession(sessionId);
      logger.info("Session cleared", { stage: "api", requestId, sessionId });
      res.status(204).end();
    } catch (err) {
      sendError(res, err, requestId, "Clearing session failed");
    }
  };
}

/**
 * POST /api/ingest — chunk, persist and index documents.
 */
export function createIngestHandler(ingestion: IngestionService) {
  return async (req: Request, res: Response): Promise<void> => {
    const requestId = requestIdOf(req);
    // Validated by ingestRequestSchema
    const body: IngestRequest = req.body;
    const { documents, chunkingStrategy, chunkSize, chunkOverlap } = body;

    logger.info("Ingest request received", {
      stage: "api",
      requestId,
      documents: documents.length,
      strategy: chunkingStrategy ?? "fixed",
    });

    try {
      const results = await ingestion.ingest(documents, { chunkingStrategy, chunkSize, chunkOverlap });
      const response: IngestResponse = { results };
      res.status(200).json(response);
    } catch (err) {
      sendError(res, err, requestId, "Ingest request failed");
    }
  };
}

/**
 * GET /api/health.
 */
export function createHealthHandler(version: string, lexical: { readonly lexicalIndexSize: number }) {
  return (_req: Request, res: Response): void => {
    const response: HealthResponse = {
      status: "ok",
      version,
      timestamp: new Date().toISOString(),
      lexicalIndexSize: lexical.lexicalIndexSize,
    };

    res.status(200).json(response);
  };
}
