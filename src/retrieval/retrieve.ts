import type { ChunkRepository } from "../db/chunks.js";
import { logger } from "../lib/logger.js";
import type { Chunk, LexicalHit, RetrievalCandidate } from "../types/index.js";
import { fuseCandidates } from "./fusion.js";
import type { LexicalIndex } from "./lexicalIndex.js";
import { DEFAULT_TOP_N, rerankCandidates, type CrossEncoder } from "./rerank.js";
import type { VectorIndexClient } from "./vectorIndex.js";

// ============================================
// Hybrid retrieval — lexical + vector → fuse → cross-encoder rerank
// ============================================

export interface RetrievalDefaults {
  kLexical: number;
  kVector: number;
  kFinal: number;
}

export const DEFAULT_RETRIEVAL: RetrievalDefaults = {
  kLexical: 20,
  kVector: 20,
  kFinal: DEFAULT_TOP_N,
};

export interface RetrievalEngineDeps {
  lexicalIndex: LexicalIndex;
  vectorIndex: VectorIndexClient;
  chunks: ChunkRepository;
  crossEncoder: CrossEncoder;
  defaults?: Partial<RetrievalDefaults>;
}

/** What the turn orchestrator needs from retrieval */
export interface Retriever {
  retrieveAndRank(query: string, kLexical?: number, kVector?: number, kFinal?: number): Promise<RetrievalCandidate[]>;
}

export class RetrievalEngine implements Retriever {
  private readonly lexicalIndex: LexicalIndex;
  private readonly vectorIndex: VectorIndexClient;
  private readonly chunks: ChunkRepository;
  private readonly crossEncoder: CrossEncoder;
  private readonly defaults: RetrievalDefaults;
  private pendingRebuild: Promise<void> | null = null;
  private queuedRebuild: Promise<void> | null = null;

  constructor(deps: RetrievalEngineDeps) {
    this.lexicalIndex = deps.lexicalIndex;
    this.vectorIndex = deps.vectorIndex;
    this.chunks = deps.chunks;
    this.crossEncoder = deps.crossEncoder;
    this.defaults = { ...DEFAULT_RETRIEVAL, ...deps.defaults };
  }

  /** Chunks in the current lexical snapshot */
  get lexicalIndexSize(): number {
    return this.lexicalIndex.size;
  }

  /**
   * Rebuild the lexical index from every stored chunk.
   *
   * A call made while a rebuild is running gets one follow-up rebuild that
   * starts when the running one settles, so chunks written before the call
   * are always in the resulting snapshot. Callers arriving during the same
   * run share that follow-up.
   */
  rebuildLexicalIndex(): Promise<void> {
    const running = this.pendingRebuild;
    if (!running) {
      return this.startRebuild();
    }

    if (!this.queuedRebuild) {
      const next = () => {
        this.queuedRebuild = null;
        return this.pendingRebuild ?? this.startRebuild();
      };
      this.queuedRebuild = running.then(next, next);
    }
    return this.queuedRebuild;
  }

  private startRebuild(): Promise<void> {
    const rebuild = this.chunks
      .readAllChunks()
      .then((corpus) => this.lexicalIndex.rebuild(corpus))
      .finally(() => {
        if (this.pendingRebuild === rebuild) this.pendingRebuild = null;
      });
    this.pendingRebuild = rebuild;
    return rebuild;
  }

  async retrieveAndRank(
    query: string,
    kLexical: number = this.defaults.kLexical,
    kVector: number = this.defaults.kVector,
    kFinal: number = this.defaults.kFinal
  ): Promise<RetrievalCandidate[]> {
    const startTime = Date.now();

    const [vectorHits, lexicalHits] = await Promise.all([
      this.vectorSearch(query, kVector),
      this.lexicalSearch(query, kLexical),
    ]);

    const payloads = await this.lexicalPayloads(vectorHits, lexicalHits);
    const fused = fuseCandidates(vectorHits, lexicalHits, payloads);

    if (fused.length === 0) {
      logger.info("No retrieval candidates", { stage: "retrieval", query: query.slice(0, 80) });
      return [];
    }

    const ranked = await this.rerank(query, fused, kFinal);

    logger.info("Retrieval complete", {
      stage: "retrieval",
      vectorHits: vectorHits.length,
      lexicalHits: lexicalHits.length,
      fused: fused.length,
      returned: ranked.length,
      topScore: ranked[0]?.score,
      latencyMs: Date.now() - startTime,
    });

    return ranked;
  }

  private async vectorSearch(query: string, k: number): Promise<RetrievalCandidate[]> {
    try {
      return await this.vectorIndex.searchText(query, k);
    } catch (err) {
      logger.warn("Vector search unavailable, continuing without it", { stage: "vector", error: err });
      return [];
    }
  }

  private async lexicalSearch(query: string, k: number): Promise<LexicalHit[]> {
    try {
      if (!this.lexicalIndex.isBuilt) {
        // A query only needs some snapshot; join a running build if there is one
        await (this.pendingRebuild ?? this.rebuildLexicalIndex());
      }
      return this.lexicalIndex.search(query, k);
    } catch (err) {
      logger.warn("Lexical search unavailable, continuing without it", { stage: "lexical", error: err });
      return [];
    }
  }

  /** Payloads for lexical hits the vector search did not already return */
  private async lexicalPayloads(
    vectorHits: RetrievalCandidate[],
    lexicalHits: LexicalHit[]
  ): Promise<Map<string, Chunk>> {
    const known = new Set(vectorHits.map((h) => h.chunkId));
    const missing = lexicalHits.map((h) => h.chunkId).filter((id) => !known.has(id));
    if (missing.length === 0) return new Map();

    try {
      const rows = await this.chunks.fetchChunksById(missing);
      return new Map(rows.map((c) => [c.chunkId, c]));
    } catch (err) {
      logger.warn("Could not load lexical hit payloads", { stage: "retrieval", count: missing.length, error: err });
      return new Map();
    }
  }

  private async rerank(query: string, fused: RetrievalCandidate[], kFinal: number): Promise<RetrievalCandidate[]> {
    try {
      return await rerankCandidates(query, fused, this.crossEncoder, kFinal);
    } catch (err) {
      logger.warn("Reranking failed, using fused order", { stage: "rerank", error: err });
      return [...fused].sort((a, b) => b.score - a.score).slice(0, Math.max(0, kFinal));
    }
  }
}
