import { z } from "zod";
import type { BookingSlotSet, ValidBookingSlots } from "../types/index.js";

// ============================================
// Slot validation
// A slot is usable only when it is explicit: ISO date, 24-hour time
// ============================================

/** Relative or vague date wording; always ambiguous even next to a valid date */
export const RELATIVE_DATE_MARKERS = [
  "today",
  "tomorrow",
  "yesterday",
  "tonight",
  "next ",
  "this ",
  "coming ",
  "in ",
  "later",
  "soon",
  "end of",
  "start of",
];

/** Vague time wording; always ambiguous even next to a valid time */
export const VAGUE_TIME_MARKERS = ["morning", "afternoon", "evening", "noon", "midnight", "around"];

const MERIDIEM_PATTERN = /(?:^|[\d\s])(?:am|pm|a\.m\.|p\.m\.)(?![a-z])/;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_24H_PATTERN = /^(\d{2}):(\d{2})$/;

const emailSchema = z.string().email();

export type SlotName = keyof ValidBookingSlots;

/**
 * YYYY-MM-DD that names a real calendar day.
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function isAmbiguousDate(value: string | undefined): boolean {
  const date = (value ?? "").trim();
  if (!date) return true;

  const lower = date.toLowerCase();
  if (RELATIVE_DATE_MARKERS.some((marker) => lower.includes(marker))) {
    return true;
  }

  return !isCalendarDate(date);
}

export function isAmbiguousTime(value: string | undefined): boolean {
  const time = (value ?? "").trim();
  if (!time) return true;

  const lower = time.toLowerCase();
  if (VAGUE_TIME_MARKERS.some((marker) => lower.includes(marker))) {
    return true;
  }
  if (MERIDIEM_PATTERN.test(lower)) {
    return true;
  }

  const match = TIME_24H_PATTERN.exec(time);
  if (!match) return true;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  return hours > 23 || minutes > 59;
}

export function isValidEmail(value: string | undefined): boolean {
  return emailSchema.safeParse((value ?? "").trim()).success;
}

/**
 * Slots that are missing or ambiguous, in asking order.
 */
export function unresolvedSlots(slots: BookingSlotSet): SlotName[] {
  const unresolved: SlotName[] = [];
  if (!slots.name?.trim()) unresolved.push("name");
  if (!isValidEmail(slots.email)) unresolved.push("email");
  if (isAmbiguousDate(slots.date)) unresolved.push("date");
  if (isAmbiguousTime(slots.time)) unresolved.push("time");
  return unresolved;
}

/**
 * The validated slot set, or null when anything still needs clarification.
 */
export function resolveSlots(slots: BookingSlotSet): ValidBookingSlots | null {
  if (unresolvedSlots(slots).length > 0) return null;
  return {
    name: (slots.name ?? "").trim(),
    email: (slots.email ?? "").trim(),
    date: (slots.date ?? "").trim(),
    time: (slots.time ?? "").trim(),
  };
}

export const GENERIC_CLARIFICATION =
  "Could you confirm the exact date (YYYY-MM-DD) and time (HH:MM, 24-hour)?";

/**
 * One message asking for every missing or ambiguous slot.
 */
export function clarificationQuestion(slots: BookingSlotSet): string {
  const parts: string[] = [];

  const missing: string[] = [];
  if (!slots.name?.trim()) missing.push("full name");
  if (!slots.email?.trim()) missing.push("email");
  if (missing.length > 0) {
    parts.push(`Please provide your ${missing.join(" and ")}.`);
  }
  if (slots.email?.trim() && !isValidEmail(slots.email)) {
    parts.push("Please provide a valid email address.");
  }

  const asks: string[] = [];
  if (isAmbiguousDate(slots.date)) {
    asks.push("an exact date in YYYY-MM-DD (e.g., 2025-03-15), not 'tomorrow' or 'next Friday'");
  }
  if (isAmbiguousTime(slots.time)) {
    asks.push("an exact time in 24-hour HH:MM (e.g., 14:30), not '3pm' or 'evening'");
  }
  if (asks.length > 0) {
    const lead = parts.length > 0 ? "Also, please confirm" : "Please confirm";
    parts.push(`${lead} ${asks.join(" and ")}.`);
  }

  return parts.length > 0 ? parts.join(" ") : GENERIC_CLARIFICATION;
}
