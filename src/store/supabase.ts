/**
 * Supabase Client
 * Singleton client for database operations
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { getConfig } from "../core/config.js";

let supabaseInstance: SupabaseClient | null = null;

/**
 * Get the Supabase client instance
 * Lazy-loaded singleton
 */
export function getSupabase(): SupabaseClient {
  if (!supabaseInstance) {
    const { url, key } = getConfig().supabase;

    supabaseInstance = createClient(url, key, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  return supabaseInstance;
}
