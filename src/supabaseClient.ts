import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { StorageConfig } from './config';

export function createSupabaseClient(
  config: Pick<StorageConfig, 'supabaseUrl' | 'supabaseServiceRoleKey'>,
  fetchImpl?: typeof fetch,
): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseServiceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    ...(fetchImpl ? { global: { fetch: fetchImpl } } : {}),
  });
}
