// ============================================
// Lexical Index Tests — BM25 ranking and rebuild semantics
// ============================================

import { describe, it, expect } from "vitest";
import { LexicalIndex, tokenize } from "../src/retrieval/lexicalIndex.js";
import { makeChunk } from "./helpers.js";

describe("tokenize", () => {
  it("lowercases and splits on non-alphanumerics", () => {
    expect(tokenize("Hello, World-42!")).toEqual(["hello", "world", "42"]);
  });

  it("returns an empty list for punctuation only", () => {
    expect(tokenize("?!...")).toEqual([]);
  });
});

describe("LexicalIndex", () => {
  it("returns nothing before the first rebuild", () => {
    const index = new LexicalIndex();
    expect(index.isBuilt).toBe(false);
    expect(index.size).toBe(0);
    expect(index.search("anything", 5)).toEqual([]);
  });

  it("scores a single matching chunk with the non-negative idf", () => {
    const index = new LexicalIndex();
    index.rebuild([makeChunk("c1", "hello world")]);

    const hits = index.search("hello", 5);
    expect(hits).toHaveLength(1);
    expect(hits[0]?.chunkId).toBe("c1");
    // N = 1, df = 1, doc length equals the average, tf = 1
    expect(hits[0]?.score).toBeCloseTo(Math.log(4 / 3), 10);
  });

  it("ranks chunks holding a rare term above chunks holding a common one", () => {
    const index = new LexicalIndex();
    index.rebuild([
      makeChunk("c1", "shared word one"),
      makeChunk("c2", "shared word two"),
      makeChunk("c3", "rare word three"),
    ]);

    const ids = index.search("shared rare", 5).map((h) => h.chunkId);
    expect(ids).toEqual(["c3", "c1", "c2"]);
  });

  it("keeps corpus order for equal scores", () => {
    const index = new LexicalIndex();
    index.rebuild([
      makeChunk("c1", "the cat sat"),
      makeChunk("c2", "the dog sat"),
      makeChunk("c3", "the cat ran"),
    ]);

    const ids = index.search("cat sat", 5).map((h) => h.chunkId);
    expect(ids).toEqual(["c1", "c2", "c3"]);
  });

  it("excludes chunks that share no term with the query", () => {
    const index = new LexicalIndex();
    index.rebuild([makeChunk("c1", "opening hours"), makeChunk("c2", "parking rules")]);

    expect(index.search("parking", 5).map((h) => h.chunkId)).toEqual(["c2"]);
    expect(index.search("refund", 5)).toEqual([]);
  });

  it("truncates to k", () => {
    const index = new LexicalIndex();
    index.rebuild([makeChunk("c1", "alpha"), makeChunk("c2", "alpha"), makeChunk("c3", "alpha")]);

    expect(index.search("alpha", 2).map((h) => h.chunkId)).toEqual(["c1", "c2"]);
    expect(index.search("alpha", 0)).toEqual([]);
  });

  it("replaces the previous corpus entirely on rebuild", () => {
    const index = new LexicalIndex();
    index.rebuild([makeChunk("old", "legacy pricing table")]);
    index.rebuild([makeChunk("new", "current pricing sheet"), makeChunk("other", "misc")]);

    expect(index.size).toBe(2);
    expect(index.search("legacy", 5)).toEqual([]);
    expect(index.search("pricing", 5).map((h) => h.chunkId)).toEqual(["new"]);
  });

  it("leaves earlier results untouched by a later rebuild", () => {
    const index = new LexicalIndex();
    index.rebuild([makeChunk("c1", "checkout time")]);
    const before = index.search("checkout", 5);

    index.rebuild([]);

    expect(before).toEqual([{ chunkId: "c1", score: expect.any(Number) }]);
    expect(index.isBuilt).toBe(true);
    expect(index.size).toBe(0);
    expect(index.search("checkout", 5)).toEqual([]);
  });
});
