import { configError, validationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { Chunk, RetrievalCandidate } from "../types/index.js";
import { normalizeVector, type Embedder } from "./embeddings.js";

// ============================================
// Vector Index Client
// Embedding function + nearest-neighbour store
// ============================================

export interface VectorPoint {
  id: string;
  vector: number[];
  payload: Chunk;
}

/** Backing nearest-neighbour store (pgvector, Qdrant, ...) */
export interface VectorStore {
  /** Dimensionality of the existing collection, or null if it does not exist */
  getDimensions(): Promise<number | null>;
  createCollection(dimensions: number): Promise<void>;
  /** Replace-by-id */
  upsert(points: VectorPoint[]): Promise<void>;
  /** Cosine similarity, descending */
  search(vector: number[], k: number): Promise<RetrievalCandidate[]>;
}

export class VectorIndexClient {
  private ready: Promise<void> | null = null;

  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore
  ) {}

  get dimensions(): number {
    return this.embedder.dimensions;
  }

  /** Unit-normalized embeddings */
  async embed(texts: string[]): Promise<number[][]> {
    const vectors = await this.embedder.embed(texts);
    return vectors.map((v) => normalizeVector(v));
  }

  /** Idempotent replace-by-id */
  async upsert(ids: string[], vectors: number[][], payloads: Chunk[]): Promise<void> {
    if (ids.length !== vectors.length || ids.length !== payloads.length) {
      throw validationError("upsert requires ids, vectors and payloads of equal length", {
        ids: ids.length,
        vectors: vectors.length,
        payloads: payloads.length,
      });
    }
    if (ids.length === 0) return;

    for (const vector of vectors) {
      this.assertDimensions(vector);
    }

    const points: VectorPoint[] = [];
    ids.forEach((id, i) => {
      const vector = vectors[i];
      const payload = payloads[i];
      if (vector && payload) points.push({ id, vector, payload });
    });

    await this.ensureCollection();
    await this.store.upsert(points);

    logger.debug("Vectors upserted", { stage: "vector", count: ids.length });
  }

  async search(queryVector: number[], k: number): Promise<RetrievalCandidate[]> {
    if (k <= 0) return [];
    this.assertDimensions(queryVector);
    await this.ensureCollection();
    const hits = await this.store.search(queryVector, k);
    return [...hits].sort((a, b) => b.score - a.score).slice(0, k);
  }

  /** Embed a query then search */
  async searchText(query: string, k: number): Promise<RetrievalCandidate[]> {
    const [vector] = await this.embed([query]);
    if (!vector) return [];
    return this.search(vector, k);
  }

  /**
   * Create the collection on first use. Runs once per client;
   * a failed attempt is retried on the next call.
   */
  ensureCollection(): Promise<void> {
    if (!this.ready) {
      this.ready = this.createIfMissing().catch((err: unknown) => {
        this.ready = null;
        throw err;
      });
    }
    return this.ready;
  }

  private async createIfMissing(): Promise<void> {
    const expected = this.embedder.dimensions;
    const existing = await this.store.getDimensions();

    if (existing === null) {
      logger.info("Creating vector collection", { stage: "vector", dimensions: expected });
      await this.store.createCollection(expected);
      return;
    }

    if (existing !== expected) {
      throw configError(
        `Vector collection has ${existing} dimensions but the embedder produces ${expected}`,
        { existing, expected }
      );
    }
  }

  private assertDimensions(vector: readonly number[]): void {
    if (vector.length !== this.embedder.dimensions) {
      throw validationError(
        `Vector has ${vector.length} dimensions, expected ${this.embedder.dimensions}`
      );
    }
  }
}
