// ============================================
// Hybrid Retrieval Tests — lexical + vector → fuse → rerank
// ============================================

import { describe, it, expect } from "vitest";
import { LexicalIndex, tokenize } from "../src/retrieval/lexicalIndex.js";
import type { CrossEncoder } from "../src/retrieval/rerank.js";
import { RetrievalEngine } from "../src/retrieval/retrieve.js";
import { VectorIndexClient } from "../src/retrieval/vectorIndex.js";
import {
  FailingCrossEncoder,
  FakeChunkRepository,
  FakeCrossEncoder,
  HashingEmbedder,
  InMemoryVectorStore,
  makeChunk,
} from "./helpers.js";

const CORPUS = [
  makeChunk("c1", "Our office opens at 9 on weekdays", "doc-1", 0),
  makeChunk("c2", "Parking is free for visitors", "doc-1", 1),
  makeChunk("c3", "Refunds are processed within 5 days", "doc-2", 0),
];

/** Relevance = number of query words present in the text */
function overlapScore(query: string, text: string): number {
  const words = new Set(tokenize(text));
  return tokenize(query).filter((t) => words.has(t)).length;
}

async function setup(crossEncoder: CrossEncoder = new FakeCrossEncoder(overlapScore)) {
  const chunks = new FakeChunkRepository(CORPUS);
  const store = new InMemoryVectorStore();
  const vectorIndex = new VectorIndexClient(new HashingEmbedder(16), store);
  await vectorIndex.upsert(
    CORPUS.map((c) => c.chunkId),
    await vectorIndex.embed(CORPUS.map((c) => c.text)),
    CORPUS
  );

  const engine = new RetrievalEngine({
    lexicalIndex: new LexicalIndex(),
    vectorIndex,
    chunks,
    crossEncoder,
  });

  return { engine, chunks, store };
}

describe("RetrievalEngine", () => {
  it("builds the lexical index lazily, once", async () => {
    const { engine, chunks } = await setup();

    expect(engine.lexicalIndexSize).toBe(0);
    await engine.retrieveAndRank("parking");
    await engine.retrieveAndRank("refunds");

    expect(chunks.readAllCalls).toBe(1);
    expect(engine.lexicalIndexSize).toBe(3);
  });

  it("queues a single follow-up rebuild for callers that arrive mid-rebuild", async () => {
    const { engine, chunks } = await setup();

    await Promise.all([engine.rebuildLexicalIndex(), engine.rebuildLexicalIndex(), engine.rebuildLexicalIndex()]);
    expect(chunks.readAllCalls).toBe(2);
  });

  it("covers chunks stored while an earlier rebuild was reading", async () => {
    const { engine, chunks } = await setup();

    chunks.holdReads();
    const warmUp = engine.rebuildLexicalIndex();
    chunks.chunks.push(makeChunk("c4", "Zebra crossings are painted white", "doc-3", 0));
    const refresh = engine.rebuildLexicalIndex();
    chunks.releaseHeldReads();
    await Promise.all([warmUp, refresh]);

    expect(engine.lexicalIndexSize).toBe(4);
  });

  it("lets a query join a running build instead of queueing another", async () => {
    const { engine, chunks } = await setup();

    chunks.holdReads();
    const warmUp = engine.rebuildLexicalIndex();
    const query = engine.retrieveAndRank("parking");
    chunks.releaseHeldReads();
    await Promise.all([warmUp, query]);

    expect(chunks.readAllCalls).toBe(1);
  });

  it("ranks by cross-encoder relevance", async () => {
    const { engine, chunks } = await setup();

    const results = await engine.retrieveAndRank("parking visitors");

    expect(results[0]?.chunkId).toBe("c2");
    expect(results[0]?.score).toBe(2);
    // Every lexical hit was already a vector hit; no payload lookup needed
    expect(chunks.fetchByIdCalls).toEqual([]);
  });

  it("truncates to kFinal", async () => {
    const { engine } = await setup();
    const results = await engine.retrieveAndRank("refunds processed", 20, 20, 2);
    expect(results).toHaveLength(2);
    expect(results[0]?.chunkId).toBe("c3");
  });

  it("answers from lexical hits when vector search fails", async () => {
    const { engine, chunks, store } = await setup();
    store.failSearch = true;

    const results = await engine.retrieveAndRank("parking visitors");

    expect(results.map((r) => [r.chunkId, r.score])).toEqual([["c2", 2]]);
    expect(chunks.fetchByIdCalls).toEqual([["c2"]]);
  });

  it("answers from vector hits when the lexical side fails", async () => {
    const { engine, chunks } = await setup();
    chunks.failReads = true;

    const results = await engine.retrieveAndRank("refunds processed");

    expect(results).toHaveLength(3);
    expect(results[0]?.chunkId).toBe("c3");
  });

  it("keeps fused order when the cross-encoder fails", async () => {
    const { engine, store } = await setup(new FailingCrossEncoder());
    store.failSearch = true;

    const results = await engine.retrieveAndRank("free parking refunds", 20, 20, 1);

    expect(results.map((r) => r.chunkId)).toEqual(["c2"]);
    expect(results[0]?.score).toBeGreaterThan(0);
  });

  it("returns nothing without calling the cross-encoder when both sides are empty", async () => {
    const encoder = new FakeCrossEncoder(overlapScore);
    const { engine, chunks, store } = await setup(encoder);
    store.failSearch = true;
    chunks.failReads = true;

    expect(await engine.retrieveAndRank("anything")).toEqual([]);
    expect(encoder.calls).toEqual([]);
  });
});
