import { normalizeVector, type Embedder } from "../retrieval/embeddings.js";

// ============================================
// Chunking — fixed-size windows or sentence groups
// ============================================

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 100;

export type ChunkingStrategy = "fixed" | "semantic";

/** Below this cosine similarity, adjacent sentences are a topic boundary */
export const SEMANTIC_BOUNDARY_SIMILARITY = 0.2;

/** A boundary only ends a chunk once it has reached this share of the target size */
export const SEMANTIC_MIN_FILL = 0.7;

/**
 * Split text into windows of `chunkSize` characters, each starting
 * `chunkSize - overlap` after the previous one. The last window may be shorter.
 *
 * Overlap is clamped to [0, chunkSize - 1] so the window always advances.
 * A non-positive size returns the text as one chunk.
 */
export function fixedSizeChunk(
  text: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP
): string[] {
  if (chunkSize <= 0) return text ? [text] : [];

  const step = chunkSize - Math.max(0, Math.min(overlap, chunkSize - 1));
  const chunks: string[] = [];

  for (let start = 0; start < text.length; start += step) {
    const end = Math.min(start + chunkSize, text.length);
    chunks.push(text.slice(start, end));
    if (end >= text.length) break;
  }

  return chunks;
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Group sentences into chunks of about `targetSize` characters.
 *
 * A chunk closes once it reaches `targetSize`, or earlier (past
 * SEMANTIC_MIN_FILL of the target) when the next sentence is dissimilar to
 * the previous one. Each new chunk starts with the last `overlap` characters
 * of the chunk before it. Text without sentences falls back to fixed windows.
 */
export async function semanticChunk(
  text: string,
  embedder: Pick<Embedder, "embed">,
  targetSize: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP
): Promise<string[]> {
  const sentences = splitSentences(text);
  if (sentences.length === 0) return fixedSizeChunk(text, targetSize, overlap);

  const embeddings = (await embedder.embed(sentences)).map((v) => normalizeVector(v));
  const minFill = Math.floor(targetSize * SEMANTIC_MIN_FILL);

  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;
  let previous: number[] = [];

  sentences.forEach((sentence, i) => {
    const embedding = embeddings[i] ?? [];

    if (currentLength > 0) {
      const similarity = dot(previous, embedding);
      const full = currentLength >= targetSize;
      const boundary = currentLength >= minFill && similarity < SEMANTIC_BOUNDARY_SIMILARITY;

      if (full || boundary) {
        const closed = current.join(" ");
        chunks.push(closed);
        const tail = overlap > 0 ? closed.slice(-overlap) : "";
        current = tail ? [tail] : [];
        currentLength = tail.length;
      }
    }

    current.push(sentence);
    currentLength += sentence.length;
    previous = embedding;
  });

  if (current.length > 0) chunks.push(current.join(" "));
  return chunks;
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/**
 * Title from the first markdown heading, falling back to the filename.
 */
export function extractTitle(content: string, filename: string): string {
  const match = content.match(/^#\s+(.+)$/m);
  if (match?.[1]) return match[1].trim();

  return filename.split("/").pop() || filename;
}

/** Content type guessed from the file extension */
export function contentTypeFor(filename: string): string {
  if (/\.(md|mdx)$/i.test(filename)) return "text/markdown";
  if (/\.pdf$/i.test(filename)) return "application/pdf";
  return "text/plain";
}
