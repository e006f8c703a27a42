import { createClient, type SupabaseClient } from '@supabase/supabase-js'

/**
 * Supabase client for backend writes
 * Prefers the service role key (bypasses RLS), falls back to the anon key
 */
export function createSupabaseClient(url: string, key: string): SupabaseClient {
  return createClient(url, key, {
    auth: {
      persistSession: false, // No session persistence in backend
      autoRefreshToken: false,
    },
  })
}
