/**
 * Supabase Client
 * Singleton client for the cache and session tables. Credentials come from
 * the base config; callers check isSupabaseConfigured() and fall back to
 * in-memory backends when it is false.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ConfigError, getBaseConfig } from "@sourcer/core";

let supabaseInstance: SupabaseClient | null = null;

/**
 * Get the Supabase client instance
 * Lazy-loaded singleton
 */
export function getSupabase(): SupabaseClient {
  if (!supabaseInstance) {
    const supabase = getBaseConfig().supabase;

    if (!supabase) {
      throw new ConfigError("Missing Supabase configuration. Set SUPABASE_URL and SUPABASE_KEY.");
    }

    supabaseInstance = createClient(supabase.url, supabase.key, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  return supabaseInstance;
}

/**
 * Check if Supabase is configured
 */
export function isSupabaseConfigured(): boolean {
  return getBaseConfig().supabase !== undefined;
}

/**
 * Reset client (for testing)
 */
export function resetSupabase(): void {
  supabaseInstance = null;
}
