// ============================================
// Turn orchestrator — booking tool state machine with RAG fall-through
// intent_gate → model_invoke → validate_slots → {clarify, commit, rag} → finalize
// ============================================

import crypto from "node:crypto";
import { clarificationQuestion, resolveSlots } from "../booking/slots.js";
import { hasBookingIntent } from "../booking/intent.js";
import { CREATE_BOOKING_TOOL, CREATE_BOOKING_TOOL_NAME, bookingToolResult, parseBookingArguments } from "../booking/tool.js";
import type { BookingRepository } from "../db/bookings.js";
import { getUserMessage, hasErrorCode, persistenceError } from "../lib/errors.js";
import { createRequestLogger, type RequestLogger } from "../lib/logger.js";
import {
  EMPTY_REPLY,
  RAG_FAILURE_REPLY,
  bookingConfirmation,
  buildBookingSystemPrompt,
  buildConversation,
  buildRagSystemPrompt,
} from "../llm/prompts.js";
import type { AssistantMessage, ChatMessage, GenerationResult, TextGenerator, ToolCall } from "../llm/types.js";
import { DEFAULT_MAX_CONTEXT_CHARS, assembleContext } from "../retrieval/context.js";
import type { Retriever } from "../retrieval/retrieve.js";
import type {
  Booking,
  BookingSlotSet,
  ConversationTurn,
  NoIntentOutcome,
  RetrievalCandidate,
  SourceChunk,
  TerminalOutcome,
  TurnResult,
  ValidBookingSlots,
} from "../types/index.js";

export const DEFAULT_HISTORY_WINDOW = 10;

const PREVIEW_CHARS = 200;

export interface TurnOrchestratorDeps {
  retriever: Retriever;
  generator: TextGenerator;
  bookings: BookingRepository;
  /** Most recent history turns passed to any model call */
  historyWindow?: number;
  maxContextChars?: number;
  now?: () => Date;
}

/** The tool call the model made, kept for the confirmation round-trip */
interface PendingCall {
  toolCall: ToolCall;
  assistantMessage: AssistantMessage;
  conversation: ChatMessage[];
}

type TurnState =
  | { step: "intent_gate" }
  | { step: "model_invoke" }
  | { step: "validate_slots"; call: PendingCall; slots: BookingSlotSet }
  | { step: "clarify"; question: string }
  | { step: "commit"; call: PendingCall; slots: ValidBookingSlots }
  | { step: "rag"; outcome: NoIntentOutcome }
  | { step: "finalize"; outcome: TerminalOutcome };

/** Everything one turn needs while it runs */
interface TurnContext {
  message: string;
  history: ConversationTurn[];
  log: RequestLogger;
}

export class TurnOrchestrator {
  private readonly retriever: Retriever;
  private readonly generator: TextGenerator;
  private readonly bookings: BookingRepository;
  private readonly historyWindow: number;
  private readonly maxContextChars: number;
  private readonly now: () => Date;

  constructor(deps: TurnOrchestratorDeps) {
    this.retriever = deps.retriever;
    this.generator = deps.generator;
    this.bookings = deps.bookings;
    this.historyWindow = deps.historyWindow ?? DEFAULT_HISTORY_WINDOW;
    this.maxContextChars = deps.maxContextChars ?? DEFAULT_MAX_CONTEXT_CHARS;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run one conversational turn.
   * Never throws for model or retrieval failures; those degrade to a reply.
   */
  async runTurn(
    sessionId: string,
    message: string,
    history: ConversationTurn[],
    requestId: string = crypto.randomUUID().slice(0, 8)
  ): Promise<TurnResult> {
    const log = createRequestLogger(requestId, "agent");
    const startTime = Date.now();
    const turn: TurnContext = {
      message,
      history: this.historyWindow > 0 ? history.slice(-this.historyWindow) : [],
      log,
    };

    let state: TurnState = { step: "intent_gate" };
    while (state.step !== "finalize") {
      log.debug("Turn step", { sessionId, step: state.step });
      state = await this.advance(state, turn);
    }

    const outcome = state.outcome;
    log.info("Turn complete", {
      sessionId,
      outcome: outcome.kind,
      latencyMs: Date.now() - startTime,
    });

    return toTurnResult(outcome);
  }

  private async advance(state: Exclude<TurnState, { step: "finalize" }>, turn: TurnContext): Promise<TurnState> {
    switch (state.step) {
      case "intent_gate":
        return hasBookingIntent(turn.message)
          ? { step: "model_invoke" }
          : { step: "rag", outcome: { kind: "no_intent", reason: "no_intent" } };

      case "model_invoke":
        return this.invokeModel(turn);

      case "validate_slots": {
        const slots = resolveSlots(state.slots);
        if (!slots) {
          return { step: "clarify", question: clarificationQuestion(state.slots) };
        }
        return { step: "commit", call: state.call, slots };
      }

      case "clarify":
        return { step: "finalize", outcome: { kind: "clarification", question: state.question } };

      case "commit":
        return this.commit(state.call, state.slots, turn);

      case "rag":
        return this.answerFromContext(state.outcome, turn);
    }
  }

  private async invokeModel(turn: TurnContext): Promise<TurnState> {
    const log = turn.log.withStage("booking");
    const conversation: ChatMessage[] = [
      { role: "system", content: buildBookingSystemPrompt(this.now()) },
      ...buildConversation(turn.history, turn.message),
    ];

    let result: GenerationResult;
    try {
      result = await this.generator.generate({
        messages: conversation,
        tools: [CREATE_BOOKING_TOOL],
        toolChoice: "auto",
      });
    } catch (err) {
      log.warn("Booking model call failed, answering from context", { error: err });
      return { step: "rag", outcome: { kind: "no_intent", reason: "generation_failed" } };
    }

    const { toolCall } = result;
    if (!toolCall) {
      const text = result.text.trim();
      if (text) {
        return { step: "clarify", question: text };
      }
      return { step: "rag", outcome: { kind: "no_intent", reason: "no_tool_call" } };
    }

    if (toolCall.name !== CREATE_BOOKING_TOOL_NAME) {
      log.warn("Model called an undeclared tool", { tool: toolCall.name });
      return { step: "rag", outcome: { kind: "no_intent", reason: "unsupported_tool" } };
    }

    const slots = parseBookingArguments(toolCall.arguments);
    if (!slots) {
      log.warn("Malformed booking arguments", { arguments: toolCall.arguments.slice(0, 200) });
      return { step: "rag", outcome: { kind: "no_intent", reason: "malformed_arguments" } };
    }

    return {
      step: "validate_slots",
      call: { toolCall, assistantMessage: result.message, conversation },
      slots,
    };
  }

  private async commit(call: PendingCall, slots: ValidBookingSlots, turn: TurnContext): Promise<TurnState> {
    const log = turn.log.withStage("booking");

    let booking: Booking;
    try {
      booking = await this.bookings.persistBooking(slots);
    } catch (err) {
      const error = hasErrorCode(err, "PERSISTENCE_FAILED") ? err : persistenceError("Failed to store booking", err);
      log.error("Booking could not be stored", { error: err });
      return { step: "finalize", outcome: { kind: "booking_failed", reply: getUserMessage(error) } };
    }

    log.info("Booking created", { bookingId: booking.id, date: booking.date, time: booking.time });

    let reply = "";
    try {
      const confirmation = await this.generator.generate({
        messages: [
          ...call.conversation,
          // Echo only the call that is being answered
          { ...call.assistantMessage, toolCalls: [call.toolCall] },
          {
            role: "tool",
            toolCallId: call.toolCall.id,
            name: call.toolCall.name,
            content: bookingToolResult(booking),
          },
        ],
        tools: [CREATE_BOOKING_TOOL],
        toolChoice: "none",
      });
      reply = confirmation.text.trim();
    } catch (err) {
      log.warn("Confirmation call failed, using template", { error: err });
    }

    return {
      step: "finalize",
      outcome: { kind: "committed", booking, reply: reply || bookingConfirmation(slots) },
    };
  }

  private async answerFromContext(fallThrough: NoIntentOutcome, turn: TurnContext): Promise<TurnState> {
    const log = turn.log.withStage("retrieval");
    log.debug("Answering from context", { reason: fallThrough.reason });

    let candidates: RetrievalCandidate[] = [];
    try {
      candidates = await this.retriever.retrieveAndRank(turn.message);
    } catch (err) {
      log.warn("Retrieval failed, answering without context", { error: err });
    }

    const context = assembleContext(candidates, this.maxContextChars);

    try {
      const result = await this.generator.generate({
        messages: [
          { role: "system", content: buildRagSystemPrompt(context) },
          ...buildConversation(turn.history, turn.message),
        ],
      });
      return {
        step: "finalize",
        outcome: { kind: "answered_from_context", reply: result.text.trim() || EMPTY_REPLY, sources: candidates },
      };
    } catch (err) {
      log.withStage("llm").error("Answer generation failed", { error: err });
      return {
        step: "finalize",
        outcome: { kind: "answered_from_context", reply: RAG_FAILURE_REPLY, sources: [] },
      };
    }
  }
}

export function toSourceChunk(candidate: RetrievalCandidate): SourceChunk {
  return {
    documentId: candidate.documentId,
    chunkIndex: candidate.index,
    textPreview: candidate.text.slice(0, PREVIEW_CHARS) + "...",
  };
}

export function toTurnResult(outcome: TerminalOutcome): TurnResult {
  switch (outcome.kind) {
    case "clarification":
      return { reply: outcome.question, sources: [], bookingCreated: false, bookingId: null };
    case "committed":
      return { reply: outcome.reply, sources: [], bookingCreated: true, bookingId: outcome.booking.id };
    case "booking_failed":
      return { reply: outcome.reply, sources: [], bookingCreated: false, bookingId: null };
    case "answered_from_context":
      return {
        reply: outcome.reply,
        sources: outcome.sources.map(toSourceChunk),
        bookingCreated: false,
        bookingId: null,
      };
    default: {
      const unhandled: never = outcome;
      return unhandled;
    }
  }
}
