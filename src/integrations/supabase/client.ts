import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Service-role client for server-side use. Sessions are never persisted;
 * row-level security is bypassed, so permission checks live in the services.
 */
export const createServiceClient = (supabaseUrl: string, serviceRoleKey: string): SupabaseClient => {
  return createClient(supabaseUrl, serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
};
