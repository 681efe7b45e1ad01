import { z } from "zod";
import type { ToolDeclaration } from "../llm/types.js";
import type { Booking, BookingSlotSet } from "../types/index.js";

// ============================================
// create_booking — the one tool the booking turn declares
// ============================================

export const CREATE_BOOKING_TOOL_NAME = "create_booking";

export const CREATE_BOOKING_TOOL: ToolDeclaration = {
  name: CREATE_BOOKING_TOOL_NAME,
  description:
    "Create a booking when all fields are explicit and unambiguous. " +
    "Only call this when you have: name, email, date as YYYY-MM-DD, and time as HH:MM (24-hour). " +
    "If any info is missing or ambiguous (e.g., 'tomorrow', 'next Friday', '3pm', 'evening'), " +
    "ask a short clarifying question instead of calling the function.",
  parameters: {
    type: "object",
    properties: {
      name: { type: "string", description: "Full name of the person." },
      email: { type: "string", description: "Email address of the person." },
      date: { type: "string", description: "Date in YYYY-MM-DD." },
      time: { type: "string", description: "Time in HH:MM, 24-hour." },
    },
    required: ["name", "email", "date", "time"],
  },
};

/** Non-string values count as absent */
const slotValue = z
  .unknown()
  .transform((v) => (typeof v === "string" && v.trim() ? v.trim() : undefined));

const argumentsSchema = z.object({
  name: slotValue,
  email: slotValue,
  date: slotValue,
  time: slotValue,
});

/**
 * Parse raw tool-call arguments.
 * Returns null when the arguments are not a JSON object.
 */
export function parseBookingArguments(raw: string): BookingSlotSet | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw || "{}");
  } catch {
    return null;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const result = argumentsSchema.safeParse(parsed);
  if (!result.success) return null;

  const slots: BookingSlotSet = {};
  if (result.data.name) slots.name = result.data.name;
  if (result.data.email) slots.email = result.data.email;
  if (result.data.date) slots.date = result.data.date;
  if (result.data.time) slots.time = result.data.time;
  return slots;
}

/** Tool result sent back to the model for the confirmation round-trip */
export function bookingToolResult(booking: Booking): string {
  return JSON.stringify({
    result: {
      booking_id: booking.id,
      name: booking.name,
      email: booking.email,
      date: booking.date,
      time: booking.time,
    },
  });
}
