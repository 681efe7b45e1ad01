// ============================================
// Prompts — booking tool turn and context-grounded answers
// ============================================

import type { ConversationTurn, ValidBookingSlots } from "../types/index.js";
import type { ChatMessage } from "./types.js";

/** Today as YYYY-MM-DD (UTC) */
export function isoDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/**
 * System prompt for the booking turn.
 * Carries today's date so the model can name concrete dates when it asks back.
 */
export function buildBookingSystemPrompt(now: Date): string {
  return `You are a scheduling assistant that books appointments with the create_booking tool.

## Rules

- You need all four fields: name, email, date (YYYY-MM-DD) and time (HH:MM, 24-hour).
- If any field is missing or ambiguous (e.g., "tomorrow", "next Friday", "3pm", "evening"), do NOT call the tool. Ask one short clarifying question instead.
- Never invent a name or email the user did not give you.
- Once the booking is created, confirm it briefly with the name, date and time.

**Today's date is ${isoDate(now)}.**`;
}

/** System prompt for answers drawn from retrieved document context */
export const RAG_SYSTEM_PROMPT = `You are a helpful assistant that answers questions using the provided context.

## Rules

- Only answer from the context below. Do not rely on outside knowledge.
- If the answer is not in the context, say you don't know and suggest uploading relevant documents.
- Keep answers concise and specific.`;

/** Context block appended to the RAG system prompt */
export function buildRagSystemPrompt(context: string): string {
  const body = context.trim() ? context : "(no relevant documents found)";
  return `${RAG_SYSTEM_PROMPT}

---BEGIN CONTEXT---
${body}
---END CONTEXT---`;
}

/** Recent history followed by the current message, oldest first */
export function buildConversation(history: ConversationTurn[], message: string): ChatMessage[] {
  const messages: ChatMessage[] = history.map((turn) =>
    turn.role === "user"
      ? { role: "user", content: turn.content }
      : { role: "assistant", content: turn.content }
  );
  messages.push({ role: "user", content: message });
  return messages;
}

/** Reply used when the confirmation round-trip produces nothing */
export function bookingConfirmation(slots: ValidBookingSlots): string {
  return `Your booking is confirmed, ${slots.name}, for ${slots.date} at ${slots.time}. A confirmation will be sent to ${slots.email}.`;
}

export const RAG_FAILURE_REPLY = "Sorry, I encountered an error. Please try again.";

export const EMPTY_REPLY = "I am unable to provide a response at this time.";
