import { z } from "zod";
import { persistenceError, retrievalError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { VectorPoint, VectorStore } from "../retrieval/vectorIndex.js";
import type { RetrievalCandidate } from "../types/index.js";
import type { SupabaseClient } from "./supabase.js";

// ============================================
// pgvector store on Supabase
// Table + RPCs are defined in supabase/migrations
// ============================================

const matchRowSchema = z.object({
  id: z.string(),
  chunk_id: z.string(),
  document_id: z.string(),
  chunk_index: z.number().int(),
  content: z.string(),
  similarity: z.number(),
});

/** Upserts per request */
const UPSERT_BATCH_SIZE = 100;

export class SupabaseVectorStore implements VectorStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async getDimensions(): Promise<number | null> {
    const { data, error } = await this.supabase.rpc("chunk_vectors_dimensions");

    if (error) {
      throw retrievalError("Failed to read vector collection dimensions", error);
    }

    return z.number().int().positive().nullable().parse(data ?? null);
  }

  async createCollection(dimensions: number): Promise<void> {
    const { error } = await this.supabase.rpc("create_chunk_vectors", { dimensions });

    if (error) {
      throw retrievalError("Failed to create vector collection", error);
    }
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    for (let i = 0; i < points.length; i += UPSERT_BATCH_SIZE) {
      const batch = points.slice(i, i + UPSERT_BATCH_SIZE).map((p) => ({
        id: p.id,
        chunk_id: p.payload.chunkId,
        document_id: p.payload.documentId,
        chunk_index: p.payload.index,
        content: p.payload.text,
        embedding: p.vector,
      }));

      const { error } = await this.supabase.from("chunk_vectors").upsert(batch, { onConflict: "id" });

      if (error) {
        logger.error("Vector upsert failed", { stage: "vector", batchStart: i, error: error.message });
        throw persistenceError("Vector upsert failed", error, { batchStart: i });
      }
    }
  }

  async search(vector: number[], k: number): Promise<RetrievalCandidate[]> {
    const { data, error } = await this.supabase.rpc("match_chunk_vectors", {
      query_embedding: vector, // Pass as number[] array, not string
      match_count: k,
    });

    if (error) {
      logger.error("match_chunk_vectors RPC failed", { stage: "vector", error: error.message });
      throw retrievalError("Vector search failed", error);
    }

    return z
      .array(matchRowSchema)
      .parse(data ?? [])
      .map((row) => ({
        chunkId: row.chunk_id,
        documentId: row.document_id,
        index: row.chunk_index,
        text: row.content,
        score: row.similarity,
      }));
  }
}
