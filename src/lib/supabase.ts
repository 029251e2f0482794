import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from '../config/env';

// ====================================================================================
// CLIENT FACTORY
// ====================================================================================

/**
 * Server-side client with the service role key. Returns null when the
 * project is not configured; callers skip persistence in that case.
 */
export function createSupabaseClient(config: Pick<AppConfig, 'supabase'>): SupabaseClient | null {
  if (!config.supabase) return null;

  return createClient(config.supabase.url, config.supabase.serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
}
