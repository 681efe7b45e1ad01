import { z } from "zod";
import { persistenceError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { Booking, ValidBookingSlots } from "../types/index.js";
import type { SupabaseClient } from "./supabase.js";

// ============================================
// Booking persistence (Supabase)
// A single insert: either the row exists or nothing does
// ============================================

export interface BookingRepository {
  persistBooking(slots: ValidBookingSlots): Promise<Booking>;
}

const bookingRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  date: z.string(),
  // Postgres `time` comes back as HH:MM:SS
  time: z.string().transform((t) => t.slice(0, 5)),
  created_at: z.string(),
});

export class SupabaseBookingRepository implements BookingRepository {
  constructor(private readonly supabase: SupabaseClient) {}

  async persistBooking(slots: ValidBookingSlots): Promise<Booking> {
    const { data, error } = await this.supabase
      .from("bookings")
      .insert({ name: slots.name, email: slots.email, date: slots.date, time: slots.time })
      .select("id, name, email, date, time, created_at")
      .single();

    if (error) {
      logger.error("Failed to store booking", {
        stage: "db",
        date: slots.date,
        time: slots.time,
        error: error.message,
      });
      throw persistenceError("Failed to store booking", error);
    }

    const parsed = bookingRowSchema.safeParse(data);
    if (!parsed.success) {
      throw persistenceError("Stored booking has an unexpected shape", parsed.error);
    }

    const row = parsed.data;
    logger.info("Booking stored", { stage: "db", bookingId: row.id });

    return {
      id: row.id,
      name: row.name,
      email: row.email,
      date: row.date,
      time: row.time,
      createdAt: row.created_at,
    };
  }
}
