import type { Chunk, LexicalHit, RetrievalCandidate } from "../types/index.js";

// ============================================
// Candidate fusion
// Vector hits first; a chunk found by both retrievers keeps the larger score
// ============================================

/**
 * Merge vector and lexical hits for one query, deduplicated by chunk id.
 *
 * A chunk found by both keeps the larger of its two scores. Lexical-only hits
 * take their payload from `payloads`; hits without a payload are dropped.
 *
 * Output order is Map insertion order: vector hits, then lexical-only hits.
 */
export function fuseCandidates(
  vectorHits: readonly RetrievalCandidate[],
  lexicalHits: readonly LexicalHit[],
  payloads: ReadonlyMap<string, Chunk>
): RetrievalCandidate[] {
  const fused = new Map<string, RetrievalCandidate>();

  for (const hit of vectorHits) {
    const existing = fused.get(hit.chunkId);
    if (!existing || hit.score > existing.score) {
      fused.set(hit.chunkId, { ...hit });
    }
  }

  for (const hit of lexicalHits) {
    const existing = fused.get(hit.chunkId);
    if (existing) {
      existing.score = Math.max(existing.score, hit.score);
      continue;
    }

    const payload = payloads.get(hit.chunkId);
    if (!payload) continue;

    fused.set(hit.chunkId, {
      chunkId: payload.chunkId,
      documentId: payload.documentId,
      index: payload.index,
      text: payload.text,
      score: hit.score,
    });
  }

  return [...fused.values()];
}
