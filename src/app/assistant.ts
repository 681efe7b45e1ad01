import crypto from "node:crypto";
import type { TurnOrchestrator } from "../agent/orchestrator.js";
import { logger } from "../lib/logger.js";
import type { ConversationMemory } from "../memory/conversationMemory.js";
import type { TurnResult } from "../types/index.js";

// ============================================
// Assistant — one chat turn with session memory around it
// ============================================

export class Assistant {
  constructor(
    private readonly orchestrator: TurnOrchestrator,
    private readonly memory: ConversationMemory
  ) {}

  /**
   * Load history, run the turn, then record the exchange.
   * A failed history write is logged; the reply is still returned.
   */
  async chat(sessionId: string, message: string, requestId: string = crypto.randomUUID().slice(0, 8)): Promise<TurnResult> {
    const history = await this.memory.getHistory(sessionId);
    const result = await this.orchestrator.runTurn(sessionId, message, history, requestId);

    try {
      await this.memory.appendExchange(sessionId, message, result.reply);
    } catch (err) {
      logger.warn("Failed to save conversation turn", { stage: "memory", requestId, sessionId, error: err });
    }

    return result;
  }

  async clearSession(sessionId: string): Promise<void> {
    await this.memory.clear(sessionId);
  }
}
