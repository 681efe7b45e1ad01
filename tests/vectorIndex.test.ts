// ============================================
// Vector Index Client Tests
// ============================================

import { describe, it, expect } from "vitest";
import { normalizeVector, type Embedder } from "../src/retrieval/embeddings.js";
import { VectorIndexClient } from "../src/retrieval/vectorIndex.js";
import { HashingEmbedder, InMemoryVectorStore, makeChunk } from "./helpers.js";

const fixedEmbedder: Embedder = {
  dimensions: 2,
  embed: async (texts) => texts.map((t) => (t === "zero" ? [0, 0] : [3, 4])),
};

describe("normalizeVector", () => {
  it("scales to unit length", () => {
    expect(normalizeVector([3, 4])).toEqual([0.6, 0.8]);
  });

  it("leaves the zero vector unchanged", () => {
    expect(normalizeVector([0, 0, 0])).toEqual([0, 0, 0]);
  });
});

describe("VectorIndexClient", () => {
  it("normalizes embeddings", async () => {
    const client = new VectorIndexClient(fixedEmbedder, new InMemoryVectorStore());
    expect(await client.embed(["text", "zero"])).toEqual([
      [0.6, 0.8],
      [0, 0],
    ]);
  });

  it("creates the collection once, on first use", async () => {
    const store = new InMemoryVectorStore();
    const client = new VectorIndexClient(new HashingEmbedder(8), store);

    expect(store.createdWith).toEqual([]);
    await Promise.all([client.searchText("first", 3), client.searchText("second", 3)]);
    await client.searchText("third", 3);

    expect(store.createdWith).toEqual([8]);
  });

  it("accepts an existing collection of the expected size", async () => {
    const store = new InMemoryVectorStore(8);
    const client = new VectorIndexClient(new HashingEmbedder(8), store);

    await client.ensureCollection();
    expect(store.createdWith).toEqual([]);
  });

  it("refuses a collection with a different dimensionality", async () => {
    const store = new InMemoryVectorStore(384);
    const client = new VectorIndexClient(new HashingEmbedder(8), store);

    await expect(client.ensureCollection()).rejects.toMatchObject({ code: "CONFIG_ERROR" });
    expect(store.createdWith).toEqual([]);
  });

  it("retries collection setup after a failed attempt", async () => {
    const store = new InMemoryVectorStore();
    let failures = 1;
    const flaky = Object.assign(store, {
      getDimensions: async (): Promise<number | null> => {
        if (failures-- > 0) throw new Error("connection reset");
        return null;
      },
    });
    const client = new VectorIndexClient(new HashingEmbedder(8), flaky);

    await expect(client.ensureCollection()).rejects.toThrow("connection reset");
    await client.ensureCollection();
    expect(store.createdWith).toEqual([8]);
  });

  it("rejects upserts with mismatched lengths", async () => {
    const client = new VectorIndexClient(fixedEmbedder, new InMemoryVectorStore());
    await expect(client.upsert(["a", "b"], [[1, 0]], [makeChunk("a", "x")])).rejects.toMatchObject({
      code: "VALIDATION_ERROR",
    });
  });

  it("rejects vectors of the wrong dimensionality", async () => {
    const client = new VectorIndexClient(fixedEmbedder, new InMemoryVectorStore());
    await expect(client.upsert(["a"], [[1, 0, 0]], [makeChunk("a", "x")])).rejects.toMatchObject({
      code: "VALIDATION_ERROR",
    });
  });

  it("replaces points by id and searches by similarity", async () => {
    const store = new InMemoryVectorStore();
    const client = new VectorIndexClient(fixedEmbedder, store);

    await client.upsert(["a", "b"], [[1, 0], [0, 1]], [makeChunk("a", "first"), makeChunk("b", "second")]);
    await client.upsert(["a"], [[0.6, 0.8]], [makeChunk("a", "first, revised")]);

    expect(store.points.size).toBe(2);

    const hits = await client.search([0, 1], 5);
    expect(hits.map((h) => h.chunkId)).toEqual(["b", "a"]);
    expect(hits[1]?.text).toBe("first, revised");
    expect(hits[1]?.score).toBeCloseTo(0.8, 10);
  });

  it("returns nothing for k <= 0", async () => {
    const client = new VectorIndexClient(fixedEmbedder, new InMemoryVectorStore());
    expect(await client.search([1, 0], 0)).toEqual([]);
  });
});
