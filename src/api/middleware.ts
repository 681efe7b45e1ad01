// ============================================
// API Middleware — request IDs, CORS, validation
// ============================================

import crypto from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

// ============================================
// Input Validation
// ============================================

export const chatRequestSchema = z.object({
  sessionId: z.string().trim().min(1, "sessionId cannot be empty").max(200),
  message: z
    .string()
    .trim()
    .min(1, "Message cannot be empty")
    .max(4000, "Message cannot exceed 4000 characters"),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export const ingestRequestSchema = z
  .object({
    documents: z
      .array(
        z.object({
          title: z.string().max(500).optional(),
          filename: z.string().trim().min(1, "filename cannot be empty").max(500),
          text: z.string().min(1, "Document text cannot be empty"),
        })
      )
      .min(1, "At least one document is required")
      .max(50, "Cannot ingest more than 50 documents per request"),
    chunkingStrategy: z.enum(["fixed", "semantic"]).optional(),
    chunkSize: z.number().int().positive().max(10_000).optional(),
    chunkOverlap: z.number().int().nonnegative().optional(),
  })
  .refine((body) => body.chunkOverlap === undefined || body.chunkOverlap < (body.chunkSize ?? 500), {
    message: "chunkOverlap must be smaller than chunkSize",
    path: ["chunkOverlap"],
  });

export type IngestRequest = z.infer<typeof ingestRequestSchema>;

/**
 * Validation middleware factory.
 */
export function validateBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const errors = result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      }));

      res.status(400).json({
        error: "VALIDATION_ERROR",
        message: "Invalid request body",
        requestId: req.requestId,
        details: errors,
      });
      return;
    }

    // Replace body with validated/transformed data
    req.body = result.data;
    next();
  };
}

// ============================================
// Request ID Middleware
// ============================================

/**
 * Add request ID to all requests for tracing.
 */
export function addRequestId(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers["x-request-id"];
  const provided = Array.isArray(header) ? header[0] : header;
  const requestId = provided?.trim() || crypto.randomUUID().slice(0, 8);
  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}

// ============================================
// CORS Configuration
// ============================================

/**
 * CORS middleware with configurable origins.
 */
export function corsMiddleware(
  allowedOrigins: string[]
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;

    if (origin && (allowedOrigins.includes("*") || allowedOrigins.includes(origin))) {
      res.setHeader("Access-Control-Allow-Origin", origin);
    }

    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, X-Request-Id");
    res.setHeader("Access-Control-Max-Age", "86400"); // 24 hours

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}
