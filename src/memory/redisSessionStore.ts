import { Redis } from "ioredis";
import { logger } from "../lib/logger.js";
import type { SessionStore } from "./sessionStore.js";

/**
 * Redis-backed session store.
 * Persistent across server restarts and shared between instances.
 */
export class RedisSessionStore implements SessionStore {
  constructor(private readonly client: Redis) {}

  static connect(redisUrl: string): RedisSessionStore {
    const client = new Redis(redisUrl, {
      // Exponential backoff, max 30 seconds
      retryStrategy: (times) => Math.min(times * 50, 30000),
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
    });

    client.on("error", (err: Error) => {
      logger.warn("Redis connection error", { stage: "memory", error: err });
    });
    client.on("ready", () => {
      logger.info("Redis ready", { stage: "memory" });
    });

    return new RedisSessionStore(client);
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.setex(key, ttlSeconds, value);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  /** Gracefully close the connection */
  async close(): Promise<void> {
    await this.client.quit();
  }
}
