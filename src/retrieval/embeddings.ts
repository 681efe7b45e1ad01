// ============================================
// Embeddings — OpenAI embedding generation
// Pin versions for retrieval determinism.
// ============================================

import type { EmbeddingCreateParams } from "openai/resources/embeddings.js";
import { logger } from "../lib/logger.js";

/** Text → vector function the vector index delegates to */
export interface Embedder {
  /** Dimensionality of every vector this embedder returns */
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}

/** The slice of the OpenAI client this module calls */
export interface EmbeddingsClient {
  embeddings: {
    create(body: EmbeddingCreateParams): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

/** Inputs longer than this are truncated to stay under the model limit */
const MAX_INPUT_CHARS = 8000;

export class OpenAIEmbedder implements Embedder {
  constructor(
    private readonly client: EmbeddingsClient,
    private readonly model: string,
    readonly dimensions: number
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts.map((t) => t.slice(0, MAX_INPUT_CHARS)),
        dimensions: this.dimensions,
      });

      // Responses carry an index; don't rely on array order
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== texts.length) {
        throw new Error(`Expected ${texts.length} embeddings, received ${ordered.length}`);
      }
      return ordered.map((d) => d.embedding);
    } catch (err) {
      logger.error("Batch embedding generation failed", {
        stage: "vector",
        model: this.model,
        textCount: texts.length,
        error: err,
      });
      throw err;
    }
  }
}

/**
 * Scale a vector to unit length so cosine similarity reduces to a dot product.
 * The zero vector is returned unchanged.
 */
export function normalizeVector(vector: readonly number[]): number[] {
  let sumSquares = 0;
  for (const v of vector) sumSquares += v * v;
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) return [...vector];
  return vector.map((v) => v / norm);
}
