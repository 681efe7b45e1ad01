// ============================================
// Test helpers — in-process stand-ins for every collaborator
// ============================================

import type { BookingRepository } from "../src/db/bookings.js";
import type { ChunkRepository, DocumentWriter } from "../src/db/chunks.js";
import type { AssistantMessage, GenerationRequest, GenerationResult, TextGenerator } from "../src/llm/types.js";
import type { Embedder } from "../src/retrieval/embeddings.js";
import { tokenize } from "../src/retrieval/lexicalIndex.js";
import type { CrossEncoder } from "../src/retrieval/rerank.js";
import type { Retriever } from "../src/retrieval/retrieve.js";
import type { VectorPoint, VectorStore } from "../src/retrieval/vectorIndex.js";
import type { Booking, Chunk, DocumentRecord, RetrievalCandidate, ValidBookingSlots } from "../src/types/index.js";

export function makeChunk(chunkId: string, text: string, documentId = "doc-1", index = 0): Chunk {
  return { chunkId, documentId, index, text };
}

export function makeCandidate(chunkId: string, score: number, text = `text of ${chunkId}`): RetrievalCandidate {
  return { chunkId, documentId: "doc-1", index: 0, text, score };
}

// ============================================
// Persistence
// ============================================

export class FakeChunkRepository implements ChunkRepository, DocumentWriter {
  readonly chunks: Chunk[] = [];
  readonly documents: DocumentRecord[] = [];
  readAllCalls = 0;
  fetchByIdCalls: string[][] = [];
  failReads = false;
  /** Document ids whose chunk insert fails */
  readonly insertFailures = new Set<string>();
  private heldReads: Promise<void> | null = null;
  private releaseReads: () => void = () => {};

  constructor(initial: Chunk[] = []) {
    this.chunks.push(...initial);
  }

  /** Reads take their snapshot immediately but resolve only after releaseHeldReads() */
  holdReads(): void {
    this.heldReads = new Promise((resolve) => {
      this.releaseReads = resolve;
    });
  }

  releaseHeldReads(): void {
    this.releaseReads();
    this.heldReads = null;
  }

  async readAllChunks(): Promise<Chunk[]> {
    this.readAllCalls++;
    if (this.failReads) throw new Error("chunk store unavailable");
    const snapshot = [...this.chunks];
    if (this.heldReads) await this.heldReads;
    return snapshot;
  }

  async fetchChunksById(ids: string[]): Promise<Chunk[]> {
    this.fetchByIdCalls.push([...ids]);
    const wanted = new Set(ids);
    return this.chunks.filter((c) => wanted.has(c.chunkId));
  }

  async createDocument(input: { title: string; filename: string; contentType: string }): Promise<DocumentRecord> {
    const record: DocumentRecord = {
      id: `doc-${this.documents.length + 1}`,
      title: input.title,
      filename: input.filename,
      contentType: input.contentType,
      createdAt: "2025-01-01T00:00:00.000Z",
    };
    this.documents.push(record);
    return record;
  }

  async insertChunks(documentId: string, texts: string[]): Promise<Chunk[]> {
    if (this.insertFailures.has(documentId)) throw new Error("insert failed");
    const inserted = texts.map((text, index) => makeChunk(`${documentId}-c${index}`, text, documentId, index));
    this.chunks.push(...inserted);
    return inserted;
  }
}

export class FakeBookingRepository implements BookingRepository {
  readonly saved: Booking[] = [];
  failWith: Error | null = null;

  async persistBooking(slots: ValidBookingSlots): Promise<Booking> {
    if (this.failWith) throw this.failWith;
    const booking: Booking = {
      id: `booking-${this.saved.length + 1}`,
      ...slots,
      createdAt: "2025-01-01T00:00:00.000Z",
    };
    this.saved.push(booking);
    return booking;
  }
}

// ============================================
// Vectors
// ============================================

/** Bag-of-words hashed into a fixed number of buckets */
export class HashingEmbedder implements Embedder {
  calls: string[][] = [];

  constructor(readonly dimensions: number = 16) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => {
      const vector = new Array<number>(this.dimensions).fill(0);
      for (const token of tokenize(text)) {
        const bucket = hash(token) % this.dimensions;
        vector[bucket] = (vector[bucket] ?? 0) + 1;
      }
      return vector;
    });
  }
}

function hash(token: string): number {
  let h = 0;
  for (const ch of token) {
    h = (h * 31 + ch.charCodeAt(0)) >>> 0;
  }
  return h;
}

/** Dot-product search over stored points (vectors are normalized upstream) */
export class InMemoryVectorStore implements VectorStore {
  readonly points = new Map<string, VectorPoint>();
  createdWith: number[] = [];
  failSearch = false;

  constructor(private dimensionsOfExisting: number | null = null) {}

  async getDimensions(): Promise<number | null> {
    return this.dimensionsOfExisting;
  }

  async createCollection(dimensions: number): Promise<void> {
    this.createdWith.push(dimensions);
    this.dimensionsOfExisting = dimensions;
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    for (const point of points) {
      this.points.set(point.id, point);
    }
  }

  async search(vector: number[], k: number): Promise<RetrievalCandidate[]> {
    if (this.failSearch) throw new Error("vector store unavailable");
    return [...this.points.values()]
      .map((p) => ({ ...p.payload, score: dot(vector, p.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }
}

function dot(a: readonly number[], b: readonly number[]): number {
  return a.reduce((sum, value, i) => sum + value * (b[i] ?? 0), 0);
}

export class FakeRetriever implements Retriever {
  readonly queries: string[] = [];

  constructor(
    private readonly results: RetrievalCandidate[] = [],
    private readonly error: Error | null = null
  ) {}

  async retrieveAndRank(query: string): Promise<RetrievalCandidate[]> {
    this.queries.push(query);
    if (this.error) throw this.error;
    return this.results;
  }
}

// ============================================
// Models
// ============================================

/** Scores each text with a caller-supplied function */
export class FakeCrossEncoder implements CrossEncoder {
  calls: Array<{ query: string; texts: string[] }> = [];

  constructor(private readonly scoreText: (query: string, text: string) => number = () => 0) {}

  async score(query: string, texts: string[]): Promise<number[]> {
    this.calls.push({ query, texts: [...texts] });
    return texts.map((text) => this.scoreText(query, text));
  }
}

export class FailingCrossEncoder implements CrossEncoder {
  async score(): Promise<number[]> {
    throw new Error("cross-encoder unavailable");
  }
}

type ScriptStep = GenerationResult | Error;

/** Replays scripted results in order and records every request */
export class ScriptedGenerator implements TextGenerator {
  readonly requests: GenerationRequest[] = [];
  private readonly script: ScriptStep[];

  constructor(...script: ScriptStep[]) {
    this.script = script;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push(request);
    const next = this.script.shift();
    if (!next) throw new Error("generator script exhausted");
    if (next instanceof Error) throw next;
    return next;
  }
}

export function textResult(text: string): GenerationResult {
  const message: AssistantMessage = { role: "assistant", content: text };
  return { text, message };
}

export function toolCallResult(name: string, args: string | Record<string, unknown>, id = "call-1"): GenerationResult {
  const toolCall = { id, name, arguments: typeof args === "string" ? args : JSON.stringify(args) };
  return { text: "", toolCall, message: { role: "assistant", content: "", toolCalls: [toolCall] } };
}
