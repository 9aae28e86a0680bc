import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

/**
 * Service-role Supabase client for server-side reads
 */

export const SupabaseConfigSchema = z.object({
  url: z.string().url('Supabase URL must be a valid URL'),
  serviceKey: z.string().min(1, 'Supabase service key is required'),
});

export type SupabaseConfig = z.infer<typeof SupabaseConfigSchema>;

export function createSupabaseServiceClient(config: SupabaseConfig): SupabaseClient {
  const { url, serviceKey } = SupabaseConfigSchema.parse(config);

  return createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
