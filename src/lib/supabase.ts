/**
 * Supabase Client Configuration
 * Service-role client used by the insight store
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseAdminConfig {
  url: string;
  serviceKey: string;
}

/**
 * Create a Supabase admin client that bypasses RLS.
 * The insight store is written by the server only; never hand this client
 * to request-scoped code.
 */
export function createSupabaseAdmin(config: SupabaseAdminConfig): SupabaseClient {
  if (config.url.trim() === '') {
    throw new Error('SUPABASE_URL is required');
  }
  if (config.serviceKey.trim() === '') {
    throw new Error('SUPABASE_SERVICE_KEY is required for admin client');
  }

  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
