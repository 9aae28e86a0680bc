/**
 * Database tier of the context cache
 *
 * Rows live in `context.cached_contexts`, keyed by cache key. Expired rows
 * are treated as absent; cleanup is left to the database.
 *
 * @module integrations/supabase-context-cache-store
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import {
  DatabaseOperationError,
  createLogger,
  type PersistedCacheEntry,
  type PersistentCacheStore,
} from '@casecontext/core';
import { z } from 'zod';

const logger = createLogger({ name: 'supabase-context-cache' });

const CACHE_SCHEMA = 'context';
const CACHE_TABLE = 'cached_contexts';

const CachedRowSchema = z.object({ payload: z.unknown() });

export interface SupabaseContextCacheStoreDeps {
  supabase: SupabaseClient;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export class SupabaseContextCacheStore implements PersistentCacheStore {
  private readonly supabase: SupabaseClient;
  private readonly now: () => Date;

  constructor(deps: SupabaseContextCacheStoreDeps) {
    this.supabase = deps.supabase;
    this.now = deps.now ?? (() => new Date());
  }

  private table() {
    return this.supabase.schema(CACHE_SCHEMA).from(CACHE_TABLE);
  }

  async get(cacheKey: string): Promise<{ payload: unknown } | null> {
    const { data, error } = await this.table()
      .select('payload')
      .eq('cache_key', cacheKey)
      .gt('expires_at', this.now().toISOString())
      .maybeSingle();

    if (error) {
      throw new DatabaseOperationError('cache get', error.message);
    }

    const row = CachedRowSchema.safeParse(data);
    return row.success ? { payload: row.data.payload } : null;
  }

  async set(entry: PersistedCacheEntry): Promise<void> {
    const { error } = await this.table().upsert(
      {
        cache_key: entry.cacheKey,
        client_id: entry.clientId,
        case_id: entry.caseId,
        scope: entry.scope,
        payload: entry.payload,
        case_status: entry.caseStatus,
        expires_at: entry.expiresAt.toISOString(),
        created_at: this.now().toISOString(),
      },
      { onConflict: 'cache_key' }
    );

    if (error) {
      throw new DatabaseOperationError('cache set', error.message);
    }

    logger.debug({ cacheKey: entry.cacheKey, expiresAt: entry.expiresAt }, 'Context persisted');
  }

  async delete(cacheKey: string): Promise<number> {
    const { count, error } = await this.table()
      .delete({ count: 'exact' })
      .eq('cache_key', cacheKey);

    if (error) {
      throw new DatabaseOperationError('cache delete', error.message);
    }

    return count ?? 0;
  }
}

export function createSupabaseContextCacheStore(
  supabase: SupabaseClient
): SupabaseContextCacheStore {
  return new SupabaseContextCacheStore({ supabase });
}
