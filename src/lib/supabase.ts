/**
 * Supabase Client Configuration
 * Service-role client for the memory tables
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseSettings {
  url: string;
  serviceKey: string;
}

/**
 * Create a Supabase admin client that bypasses RLS.
 * The memory tables are only reached from server-side code.
 */
export function createSupabaseAdmin(settings: SupabaseSettings): SupabaseClient {
  if (settings.url === '' || settings.serviceKey === '') {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY are required');
  }
  return createClient(settings.url, settings.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
