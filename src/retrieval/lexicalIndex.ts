import { logger } from "../lib/logger.js";
import type { Chunk, LexicalHit } from "../types/index.js";

// ============================================
// Lexical Index — BM25 over every stored chunk
// Rebuilt from scratch; readers always see a complete snapshot
// ============================================

/** Term-frequency saturation */
export const BM25_K1 = 1.5;
/** Document-length normalization */
export const BM25_B = 0.75;

interface Posting {
  /** Position of the chunk in the corpus the snapshot was built from */
  doc: number;
  tf: number;
}

/** A fully built, never-mutated index */
interface LexicalSnapshot {
  chunkIds: string[];
  docLengths: number[];
  avgDocLength: number;
  postings: Map<string, Posting[]>;
  idf: Map<string, number>;
}

/**
 * Lowercase alphanumeric word tokenization.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

function buildSnapshot(corpus: readonly Chunk[]): LexicalSnapshot {
  const chunkIds: string[] = [];
  const docLengths: number[] = [];
  const postings = new Map<string, Posting[]>();
  let totalLength = 0;

  corpus.forEach((chunk, doc) => {
    const tokens = tokenize(chunk.text);
    chunkIds.push(chunk.chunkId);
    docLengths.push(tokens.length);
    totalLength += tokens.length;

    const counts = new Map<string, number>();
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    for (const [term, tf] of counts) {
      const list = postings.get(term);
      if (list) {
        list.push({ doc, tf });
      } else {
        postings.set(term, [{ doc, tf }]);
      }
    }
  });

  const n = corpus.length;
  const idf = new Map<string, number>();
  for (const [term, list] of postings) {
    const df = list.length;
    idf.set(term, Math.log(1 + (n - df + 0.5) / (df + 0.5)));
  }

  return {
    chunkIds,
    docLengths,
    avgDocLength: n > 0 ? totalLength / n : 0,
    postings,
    idf,
  };
}

export class LexicalIndex {
  private snapshot: LexicalSnapshot | null = null;

  /** Whether rebuild() has completed at least once */
  get isBuilt(): boolean {
    return this.snapshot !== null;
  }

  /** Number of chunks in the current snapshot */
  get size(): number {
    return this.snapshot?.chunkIds.length ?? 0;
  }

  /**
   * Replace the index with one built from `corpus`.
   * The new snapshot is built off to the side and swapped in whole.
   */
  rebuild(corpus: readonly Chunk[]): void {
    const startTime = Date.now();
    const next = buildSnapshot(corpus);
    this.snapshot = next;

    logger.info("Lexical index rebuilt", {
      stage: "lexical",
      chunks: next.chunkIds.length,
      terms: next.postings.size,
      durationMs: Date.now() - startTime,
    });
  }

  /**
   * Top-k chunks by BM25 score. Equal scores keep corpus order.
   */
  search(query: string, k: number): LexicalHit[] {
    const snapshot = this.snapshot;
    if (!snapshot || snapshot.chunkIds.length === 0 || k <= 0) {
      return [];
    }

    const queryTokens = tokenize(query);
    if (queryTokens.length === 0) {
      return [];
    }

    const scores = new Float64Array(snapshot.chunkIds.length);
    const matched = new Set<number>();

    // Repeated query terms contribute once per occurrence
    for (const term of queryTokens) {
      const list = snapshot.postings.get(term);
      const idf = snapshot.idf.get(term);
      if (!list || idf === undefined) continue;

      for (const { doc, tf } of list) {
        const docLength = snapshot.docLengths[doc] ?? 0;
        const norm = 1 - BM25_B + (BM25_B * docLength) / (snapshot.avgDocLength || 1);
        scores[doc] = (scores[doc] ?? 0) + (idf * (tf * (BM25_K1 + 1))) / (tf + BM25_K1 * norm);
        matched.add(doc);
      }
    }

    return [...matched]
      .sort((a, b) => (scores[b] ?? 0) - (scores[a] ?? 0) || a - b)
      .slice(0, k)
      .map((doc) => ({
        chunkId: snapshot.chunkIds[doc] ?? "",
        score: scores[doc] ?? 0,
      }));
  }
}
