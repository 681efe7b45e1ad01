import type { RetrievalCandidate } from "../types/index.js";

export const DEFAULT_MAX_CONTEXT_CHARS = 6000;

const SEPARATOR = "\n\n";

/**
 * Join ranked chunk texts with blank lines until `budget` characters.
 * The chunk that would overflow is cut to fill the remaining budget and
 * nothing after it is included. Separators count toward the budget.
 */
export function assembleContext(
  candidates: readonly Pick<RetrievalCandidate, "text">[],
  budget: number = DEFAULT_MAX_CONTEXT_CHARS
): string {
  let context = "";

  for (const candidate of candidates) {
    const separator = context.length > 0 ? SEPARATOR : "";
    const piece = separator + candidate.text;

    if (context.length + piece.length > budget) {
      const remaining = budget - context.length - separator.length;
      if (remaining > 0) {
        context += separator + candidate.text.slice(0, remaining);
      }
      break;
    }

    context += piece;
  }

  return context;
}
