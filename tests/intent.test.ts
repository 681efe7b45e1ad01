// ============================================
// Booking Intent Tests
// ============================================

import { describe, it, expect } from "vitest";
import { hasBookingIntent } from "../src/booking/intent.js";

describe("hasBookingIntent", () => {
  it.each([
    "I want to book an appointment",
    "Can you schedule an interview for me?",
    "Please set up a meeting with the team",
    "Book me for Friday",
    "reserve me a spot",
    "We need a booking table for two",
    "BOOK AN APPOINTMENT",
    "Could you reschedule my meeting?",
  ])("detects a booking request: %s", (message) => {
    expect(hasBookingIntent(message)).toBe(true);
  });

  it.each([
    "What is your pricing for booking a table?",
    "What is the booking policy?",
    "How do I cancel a booking?",
    "Tell me about your appointment pricing",
    "Is there documentation on scheduling meetings?",
    "Can I use booking.com to book a meeting?",
    "Where is the office?",
    "I'd like to schedule something",
    "bookkeeping appointment notes",
    "",
  ])("ignores a non-booking message: %s", (message) => {
    expect(hasBookingIntent(message)).toBe(false);
  });
});
