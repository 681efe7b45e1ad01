import { logger } from "../lib/logger.js";

// ============================================
// Session store — string values with a time-to-live
// ============================================

export interface SessionStore {
  get(key: string): Promise<string | null>;
  /** Write and (re)start the expiry clock */
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

interface StoredValue {
  value: string;
  expiresAt: number;
}

/**
 * Process-local store for development and single-instance deployments.
 * Expired entries are dropped on read and swept on write.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly entries = new Map<string, StoredValue>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }

    return entry.value;
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
    this.cleanupExpired();
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /**
   * Remove expired entries from the store.
   */
  private cleanupExpired(): void {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug("Expired sessions removed", { stage: "memory", removed });
    }
  }
}
