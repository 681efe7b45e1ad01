import { z } from "zod";
import { logger } from "../lib/logger.js";
import type { TextGenerator } from "../llm/types.js";
import type { RetrievalCandidate } from "../types/index.js";

// ============================================
// Cross-encoder reranking
// Scores (query, candidate) pairs jointly and reorders by that score
// ============================================

/** (query, text) → relevance, batched over candidate texts */
export interface CrossEncoder {
  /** One score per text, in input order */
  score(query: string, texts: string[]): Promise<number[]>;
}

export const DEFAULT_TOP_N = 5;

/**
 * Replace every candidate's score with its cross-encoder relevance,
 * sort descending and keep the top `topN`.
 * An empty candidate list never reaches the cross-encoder.
 */
export async function rerankCandidates(
  query: string,
  candidates: RetrievalCandidate[],
  crossEncoder: CrossEncoder,
  topN: number = DEFAULT_TOP_N
): Promise<RetrievalCandidate[]> {
  if (candidates.length === 0) {
    return [];
  }

  const scores = await crossEncoder.score(
    query,
    candidates.map((c) => c.text)
  );

  if (scores.length !== candidates.length) {
    throw new Error(`Cross-encoder returned ${scores.length} scores for ${candidates.length} candidates`);
  }

  // Array.prototype.sort is stable: equal scores keep fused-map order
  return candidates
    .map((candidate, i) => ({ ...candidate, score: scores[i] ?? 0 }))
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, topN));
}

// ============================================
// HTTP cross-encoder (text-embeddings-inference /rerank)
// ============================================

const rerankResponseSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    score: z.number(),
  })
);

type FetchFn = typeof fetch;

export class HttpCrossEncoder implements CrossEncoder {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: FetchFn = fetch
  ) {}

  async score(query: string, texts: string[]): Promise<number[]> {
    if (texts.length === 0) return [];

    const response = await this.fetchImpl(`${this.baseUrl.replace(/\/$/, "")}/rerank`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ query, texts, raw_scores: true, truncate: true }),
    });

    if (!response.ok) {
      throw new Error(`Cross-encoder request failed: ${response.status}`);
    }

    const ranked = rerankResponseSchema.parse(await response.json());

    // The endpoint returns results sorted by score; put them back in input order
    const scores = new Array<number>(texts.length).fill(Number.NEGATIVE_INFINITY);
    for (const { index, score } of ranked) {
      if (index < texts.length) scores[index] = score;
    }
    return scores;
  }
}

// ============================================
// LLM relevance judge
// Used when no cross-encoder endpoint is configured
// ============================================

/** Neutral score for chunks the judge skipped */
const DEFAULT_JUDGE_SCORE = 5;

/** Characters of each chunk shown to the judge */
const JUDGE_PREVIEW_CHARS = 400;

const RERANK_PROMPT = `You are a relevance judge for a document question-answering system.

Score how relevant each text chunk is to answering the given question.
Output ONLY a JSON array of scores, one per chunk, in order.

Scoring guide:
- 10: Directly answers the question with specific details
- 7-9: Highly relevant, contains key information for the answer
- 4-6: Somewhat relevant, provides useful context
- 1-3: Tangentially related, might help but not directly
- 0: Completely irrelevant

Output format: [score1, score2, score3, ...]
Output ONLY the JSON array, no other text.`;

export class LlmCrossEncoder implements CrossEncoder {
  constructor(private readonly generator: TextGenerator) {}

  async score(query: string, texts: string[]): Promise<number[]> {
    if (texts.length === 0) return [];

    const chunksText = texts
      .map((text, i) => `[Chunk ${i + 1}]\n${text.slice(0, JUDGE_PREVIEW_CHARS)}`)
      .join("\n\n---\n\n");

    const result = await this.generator.generate({
      messages: [
        { role: "system", content: RERANK_PROMPT },
        { role: "user", content: `QUESTION: ${query}\n\nCHUNKS TO SCORE:\n${chunksText}` },
      ],
      temperature: 0.1,
      maxTokens: Math.max(200, texts.length * 6),
    });

    const scores = parseScores(result.text, texts.length);

    logger.debug("LLM relevance scores", {
      stage: "rerank",
      count: texts.length,
      topScore: Math.max(...scores),
    });

    // Normalize 0-10 to 0-1
    return scores.map((s) => s / 10);
  }
}

/**
 * Parse LLM output into array of scores.
 * Pads or trims to the expected count and clamps to 0-10.
 */
export function parseScores(output: string, expectedCount: number): number[] {
  const fallback = new Array<number>(expectedCount).fill(DEFAULT_JUDGE_SCORE);
  const match = output.match(/\[[\d\s,.-]*\]/);
  if (!match) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(match[0]);
  } catch {
    logger.warn("Unparseable relevance scores", { stage: "rerank", output: output.slice(0, 100) });
    return fallback;
  }
  if (!Array.isArray(parsed)) {
    return fallback;
  }

  const scores = parsed.map((v: unknown) => {
    const num = typeof v === "number" ? v : Number.NaN;
    return Number.isNaN(num) ? DEFAULT_JUDGE_SCORE : Math.max(0, Math.min(10, num));
  });

  while (scores.length < expectedCount) scores.push(DEFAULT_JUDGE_SCORE);
  return scores.slice(0, expectedCount);
}
