import { z } from "zod";
import { KeyedLock } from "../lib/keyedLock.js";
import { logger } from "../lib/logger.js";
import type { ConversationRole, ConversationTurn } from "../types/index.js";
import type { SessionStore } from "./sessionStore.js";

// ============================================
// Conversation Memory
// Per-session turn log, trimmed to the most recent pairs, expiring after a TTL
// ============================================

export interface ConversationMemoryOptions {
  /** User+assistant pairs kept per session */
  maxTurns?: number;
  ttlSeconds?: number;
  keyPrefix?: string;
}

export const DEFAULT_MAX_TURNS = 20;
export const DEFAULT_HISTORY_TTL_SECONDS = 60 * 60 * 24 * 7; // 7 days

const historySchema = z.array(
  z.object({
    role: z.enum(["user", "assistant"]),
    content: z.string(),
  })
);

export class ConversationMemory {
  private readonly maxTurns: number;
  private readonly ttlSeconds: number;
  private readonly keyPrefix: string;
  private readonly lock = new KeyedLock();

  constructor(
    private readonly store: SessionStore,
    options: ConversationMemoryOptions = {}
  ) {
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_HISTORY_TTL_SECONDS;
    this.keyPrefix = options.keyPrefix ?? "chat:";
  }

  /** Entries kept per session */
  get maxEntries(): number {
    return this.maxTurns * 2;
  }

  /**
   * Ordered turns for a session.
   * Missing or malformed state reads as an empty history.
   */
  async getHistory(sessionId: string): Promise<ConversationTurn[]> {
    const raw = await this.store.get(this.key(sessionId));
    if (!raw) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      logger.warn("Discarding unparseable conversation history", { stage: "memory", sessionId });
      return [];
    }

    const result = historySchema.safeParse(parsed);
    if (!result.success) {
      logger.warn("Discarding malformed conversation history", { stage: "memory", sessionId });
      return [];
    }

    return result.data;
  }

  /** Append one turn, trim, and refresh the expiry */
  async append(sessionId: string, role: ConversationRole, content: string): Promise<void> {
    await this.write(sessionId, [{ role, content }]);
  }

  /** Append a user message and its reply as one serialized update */
  async appendExchange(sessionId: string, userMessage: string, reply: string): Promise<void> {
    await this.write(sessionId, [
      { role: "user", content: userMessage },
      { role: "assistant", content: reply },
    ]);
  }

  async clear(sessionId: string): Promise<void> {
    await this.lock.run(sessionId, () => this.store.delete(this.key(sessionId)));
    logger.info("Conversation cleared", { stage: "memory", sessionId });
  }

  private write(sessionId: string, turns: ConversationTurn[]): Promise<void> {
    return this.lock.run(sessionId, async () => {
      const history = await this.getHistory(sessionId);
      history.push(...turns);
      const trimmed = history.slice(-this.maxEntries);
      await this.store.setWithTtl(this.key(sessionId), JSON.stringify(trimmed), this.ttlSeconds);
    });
  }

  private key(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }
}
