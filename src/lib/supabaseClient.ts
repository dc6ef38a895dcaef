import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { SUPABASE_ANON_KEY, SUPABASE_URL } from "@/config";

export type SupabaseClientOptions = {
  url?: string;
  anonKey?: string;
  fetch?: typeof fetch;
};

/**
 * Server-side client: no session persistence, no token refresh timers.
 * Purchases are keyed by app user id instead of an auth session.
 */
export function createSupabaseClient({
  url = SUPABASE_URL,
  anonKey = SUPABASE_ANON_KEY,
  fetch: customFetch,
}: SupabaseClientOptions = {}): SupabaseClient {
  if (!url || !anonKey) {
    throw new Error("Supabase is not configured (SUPABASE_URL / SUPABASE_ANON_KEY)");
  }

  return createClient(url, anonKey, {
    auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
    global: customFetch ? { fetch: customFetch } : undefined,
  });
}
