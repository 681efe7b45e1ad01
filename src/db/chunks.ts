import { z } from "zod";
import { persistenceError, retrievalError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { Chunk, DocumentRecord } from "../types/index.js";
import type { SupabaseClient } from "./supabase.js";

// ============================================
// Chunk + document persistence (Supabase)
// ============================================

/** Read side used by retrieval */
export interface ChunkRepository {
  readAllChunks(): Promise<Chunk[]>;
  fetchChunksById(ids: string[]): Promise<Chunk[]>;
}

/** Write side used by ingestion */
export interface DocumentWriter {
  createDocument(input: { title: string; filename: string; contentType: string }): Promise<DocumentRecord>;
  /** Insert chunk texts in order; chunk index is the position in `texts` */
  insertChunks(documentId: string, texts: string[]): Promise<Chunk[]>;
}

const chunkRowSchema = z.object({
  id: z.string(),
  document_id: z.string(),
  chunk_index: z.number().int(),
  text: z.string(),
});

const documentRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  filename: z.string(),
  content_type: z.string(),
  created_at: z.string(),
});

type ChunkRow = z.infer<typeof chunkRowSchema>;

const CHUNK_COLUMNS = "id, document_id, chunk_index, text";

/** PostgREST caps a single response; page through larger tables */
const PAGE_SIZE = 1000;

/** Keep `in (...)` filters under URL length limits */
const ID_BATCH_SIZE = 200;

function toChunk(row: ChunkRow): Chunk {
  return {
    chunkId: row.id,
    documentId: row.document_id,
    index: row.chunk_index,
    text: row.text,
  };
}

export class SupabaseChunkRepository implements ChunkRepository, DocumentWriter {
  constructor(private readonly supabase: SupabaseClient) {}

  async readAllChunks(): Promise<Chunk[]> {
    const chunks: Chunk[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.supabase
        .from("chunks")
        .select(CHUNK_COLUMNS)
        .order("document_id", { ascending: true })
        .order("chunk_index", { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) {
        logger.error("Failed to read chunks", { stage: "db", from, error: error.message });
        throw retrievalError("Failed to read chunks", error);
      }

      const rows = z.array(chunkRowSchema).parse(data ?? []);
      chunks.push(...rows.map(toChunk));
      if (rows.length < PAGE_SIZE) break;
    }

    logger.debug("Read all chunks", { stage: "db", count: chunks.length });
    return chunks;
  }

  async fetchChunksById(ids: string[]): Promise<Chunk[]> {
    const unique = [...new Set(ids)];
    if (unique.length === 0) return [];

    const chunks: Chunk[] = [];
    for (let i = 0; i < unique.length; i += ID_BATCH_SIZE) {
      const batch = unique.slice(i, i + ID_BATCH_SIZE);
      const { data, error } = await this.supabase.from("chunks").select(CHUNK_COLUMNS).in("id", batch);

      if (error) {
        logger.error("Failed to fetch chunks by id", { stage: "db", count: batch.length, error: error.message });
        throw retrievalError("Failed to fetch chunks by id", error);
      }

      chunks.push(...z.array(chunkRowSchema).parse(data ?? []).map(toChunk));
    }

    return chunks;
  }

  async createDocument(input: { title: string; filename: string; contentType: string }): Promise<DocumentRecord> {
    const { data, error } = await this.supabase
      .from("documents")
      .insert({ title: input.title, filename: input.filename, content_type: input.contentType })
      .select("id, title, filename, content_type, created_at")
      .single();

    if (error) {
      logger.error("Failed to create document", { stage: "db", filename: input.filename, error: error.message });
      throw persistenceError("Failed to create document", error, { filename: input.filename });
    }

    const row = documentRowSchema.parse(data);
    return {
      id: row.id,
      title: row.title,
      filename: row.filename,
      contentType: row.content_type,
      createdAt: row.created_at,
    };
  }

  async insertChunks(documentId: string, texts: string[]): Promise<Chunk[]> {
    if (texts.length === 0) return [];

    const { data, error } = await this.supabase
      .from("chunks")
      .insert(texts.map((text, index) => ({ document_id: documentId, chunk_index: index, text })))
      .select(CHUNK_COLUMNS);

    if (error) {
      logger.error("Failed to insert chunks", { stage: "db", documentId, error: error.message });
      throw persistenceError("Failed to insert chunks", error, { documentId });
    }

    return z
      .array(chunkRowSchema)
      .parse(data ?? [])
      .map(toChunk)
      .sort((a, b) => a.index - b.index);
  }
}
