import { describe, it, expect, beforeEach } from 'vitest';
import { http, HttpResponse } from 'msw';
import { SupabaseContextCacheStore } from '../supabase-context-cache-store.js';
import { createSupabaseServiceClient } from '../supabase.js';
import { server, SUPABASE_TEST_URL } from '../__mocks__/setup.js';

const FRESH_KEY = 'context:client-1:case-1:standard:abcd1234';
const EXPIRED_KEY = 'context:client-1:case-1:minimal:abcd1234';
const NOW = new Date('2025-03-01T00:00:00.000Z');

describe('SupabaseContextCacheStore', () => {
  let store: SupabaseContextCacheStore;

  beforeEach(() => {
    const supabase = createSupabaseServiceClient({
      url: SUPABASE_TEST_URL,
      serviceKey: 'test-secret',
    });
    store = new SupabaseContextCacheStore({ supabase, now: () => NOW });
  });

  describe('get', () => {
    it('should return the payload of an unexpired row', async () => {
      await expect(store.get(FRESH_KEY)).resolves.toEqual({ payload: { case_id: 'case-1' } });
    });

    it('should treat an expired row as absent', async () => {
      await expect(store.get(EXPIRED_KEY)).resolves.toBeNull();
    });

    it('should return null for an unknown key', async () => {
      await expect(store.get('context:none')).resolves.toBeNull();
    });
  });

  describe('set', () => {
    it('should upsert the entry on its cache key', async () => {
      let body: unknown;
      let onConflict: string | null = null;
      let profile: string | null = null;
      server.use(
        http.post(`${SUPABASE_TEST_URL}/rest/v1/cached_contexts`, async ({ request }) => {
          body = await request.json();
          onConflict = new URL(request.url).searchParams.get('on_conflict');
          profile = request.headers.get('content-profile');
          return new HttpResponse(null, { status: 201 });
        })
      );

      await store.set({
        cacheKey: FRESH_KEY,
        clientId: 'client-1',
        caseId: 'case-1',
        scope: 'standard',
        payload: { case_id: 'case-1' },
        caseStatus: 'closed',
        expiresAt: new Date('2025-03-02T00:00:00.000Z'),
      });

      expect(body).toEqual({
        cache_key: FRESH_KEY,
        client_id: 'client-1',
        case_id: 'case-1',
        scope: 'standard',
        payload: { case_id: 'case-1' },
        case_status: 'closed',
        expires_at: '2025-03-02T00:00:00.000Z',
        created_at: '2025-03-01T00:00:00.000Z',
      });
      expect(onConflict).toBe('cache_key');
      expect(profile).toBe('context');
    });

    it('should raise when the write fails', async () => {
      server.use(
        http.post(`${SUPABASE_TEST_URL}/rest/v1/cached_contexts`, () => {
          return HttpResponse.json({ message: 'disk full' }, { status: 500 });
        })
      );

      await expect(
        store.set({
          cacheKey: FRESH_KEY,
          clientId: 'client-1',
          caseId: 'case-1',
          scope: 'standard',
          payload: {},
          caseStatus: 'active',
          expiresAt: NOW,
        })
      ).rejects.toThrow('Database cache set failed: disk full');
    });
  });

  describe('delete', () => {
    it('should return the number of removed rows', async () => {
      await expect(store.delete(FRESH_KEY)).resolves.toBe(1);
    });

    it('should return 0 when nothing matched', async () => {
      await expect(store.delete('context:none')).resolves.toBe(0);
    });
  });
});
