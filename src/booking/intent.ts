// ============================================
// Booking intent — deterministic two-stage classifier
// Informational phrasing is rejected before booking keywords are considered
// ============================================

/** Questions *about* booking, not requests to book */
export const INFORMATIONAL_PHRASES = [
  "what is",
  "what's",
  "how do",
  "how to",
  "how does",
  "explain",
  "tell me about",
  "docs",
  "documentation",
  "guide",
  "policy",
  "pricing",
  "price",
  "cost",
  "example",
  "sample",
  "tutorial",
  "booking.com",
];

const ACTION_PATTERN =
  /\b(book|schedule|reserve|arrange|set\s*up|setup|make|create|confirm|reschedule|cancel|add|put)\b/;

const BOOKING_NOUN_PATTERN = /\b(appointment|interview|booking|meeting|slot)\b/;

const BOOKING_IDIOM = "booking table";

const BOOK_ME_PATTERN = /\b(book|schedule|reserve)\s+me\b/;

/**
 * Whether a message asks to make a booking.
 */
export function hasBookingIntent(text: string): boolean {
  if (!text) return false;
  const message = text.toLowerCase();

  if (INFORMATIONAL_PHRASES.some((phrase) => message.includes(phrase))) {
    return false;
  }

  if (message.includes(BOOKING_IDIOM)) {
    return true;
  }

  if (ACTION_PATTERN.test(message) && BOOKING_NOUN_PATTERN.test(message)) {
    return true;
  }

  return BOOK_ME_PATTERN.test(message);
}
