import { createClient, type SupabaseClient } from "@supabase/supabase-js";

// ============================================
// Supabase client — service-role access for server-side repositories
// ============================================

export function createSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

export type { SupabaseClient };
