import type { DocumentWriter } from "../db/chunks.js";
import { logger } from "../lib/logger.js";
import type { VectorIndexClient } from "../retrieval/vectorIndex.js";
import type { IngestResult } from "../types/index.js";
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  contentTypeFor,
  extractTitle,
  fixedSizeChunk,
  semanticChunk,
  type ChunkingStrategy,
} from "./chunker.js";

// ============================================
// Ingestion — document → chunks → vectors, then a lexical rebuild
// ============================================

export interface IngestDocument {
  title?: string;
  filename: string;
  text: string;
}

export interface IngestOptions {
  chunkingStrategy?: ChunkingStrategy;
  /** Window size for "fixed", target size for "semantic" */
  chunkSize?: number;
  chunkOverlap?: number;
}

interface ChunkSettings {
  strategy: ChunkingStrategy;
  size: number;
  overlap: number;
}

/** Anything that can rebuild the lexical index from persisted chunks */
export interface LexicalRebuilder {
  rebuildLexicalIndex(): Promise<void>;
}

export class IngestionService {
  constructor(
    private readonly documents: DocumentWriter,
    private readonly vectorIndex: VectorIndexClient,
    private readonly lexical: LexicalRebuilder
  ) {}

  /**
   * Persist, embed and index a batch of documents.
   * The lexical index is rebuilt once, after every document is stored. If a
   * document fails, the ones stored before it are still made searchable.
   */
  async ingest(documents: IngestDocument[], options: IngestOptions = {}): Promise<IngestResult[]> {
    const settings: ChunkSettings = {
      strategy: options.chunkingStrategy ?? "fixed",
      size: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
      overlap: options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP,
    };
    const results: IngestResult[] = [];

    try {
      for (const doc of documents) {
        results.push(await this.indexDocument(doc, settings));
      }
    } catch (err) {
      logger.error("Ingestion failed", { stage: "indexer", stored: results.length, error: err });
      if (results.length > 0) {
        await this.lexical.rebuildLexicalIndex().catch((rebuildErr: unknown) => {
          logger.error("Lexical rebuild after failed ingestion failed", { stage: "indexer", error: rebuildErr });
        });
      }
      throw err;
    }

    await this.lexical.rebuildLexicalIndex();

    logger.info("Ingestion complete", {
      stage: "indexer",
      documents: results.length,
      chunks: results.reduce((sum, r) => sum + r.chunksIndexed, 0),
      strategy: settings.strategy,
    });

    return results;
  }

  private async indexDocument(doc: IngestDocument, settings: ChunkSettings): Promise<IngestResult> {
    const record = await this.documents.createDocument({
      title: doc.title?.trim() || extractTitle(doc.text, doc.filename),
      filename: doc.filename,
      contentType: contentTypeFor(doc.filename),
    });

    const texts = (await this.chunk(doc.text, settings)).filter((t) => t.trim().length > 0);
    if (texts.length === 0) {
      logger.warn("Document produced no chunks", { stage: "indexer", documentId: record.id });
      return { documentId: record.id, chunksIndexed: 0 };
    }

    const chunks = await this.documents.insertChunks(record.id, texts);
    const vectors = await this.vectorIndex.embed(chunks.map((c) => c.text));
    await this.vectorIndex.upsert(
      chunks.map((c) => c.chunkId),
      vectors,
      chunks
    );

    logger.info("Indexed document", {
      stage: "indexer",
      documentId: record.id,
      filename: doc.filename,
      chunks: chunks.length,
    });

    return { documentId: record.id, chunksIndexed: chunks.length };
  }

  private async chunk(text: string, settings: ChunkSettings): Promise<string[]> {
    switch (settings.strategy) {
      case "fixed":
        return fixedSizeChunk(text, settings.size, settings.overlap);
      case "semantic":
        return semanticChunk(text, this.vectorIndex, settings.size, settings.overlap);
    }
  }
}
