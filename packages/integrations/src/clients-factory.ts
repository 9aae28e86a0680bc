/**
 * Shared client factory for the context engine
 *
 * Builds the GraphRAG client and, when a database is configured, the
 * Supabase-backed case repository and cache store.
 */

import type { CircuitBreakerRegistry } from '@casecontext/core';
import { createLogger } from '@casecontext/core';
import type { SupabaseClient } from '@supabase/supabase-js';
import { createGraphRAGClient, type GraphRAGClient, type GraphRAGClientConfig } from './graphrag.js';
import { createSupabaseServiceClient, type SupabaseConfig } from './supabase.js';
import { SupabaseCaseRepository } from './supabase-case-repository.js';
import { SupabaseContextCacheStore } from './supabase-context-cache-store.js';

const logger = createLogger({ name: 'clients-factory' });

export interface IntegrationClientsConfig {
  graphrag?: GraphRAGClientConfig;
  /** Omit to run without a database */
  supabase?: SupabaseConfig | null;
  circuitBreakerRegistry?: CircuitBreakerRegistry;
}

export interface DatabaseClients {
  supabase: SupabaseClient;
  repository: SupabaseCaseRepository;
  cacheStore: SupabaseContextCacheStore;
}

export interface IntegrationClients {
  graphrag: GraphRAGClient;
  database: DatabaseClients | null;
}

export function createIntegrationClients(config: IntegrationClientsConfig = {}): IntegrationClients {
  const graphrag = createGraphRAGClient(
    config.graphrag ?? {},
    config.circuitBreakerRegistry ? { circuitBreakerRegistry: config.circuitBreakerRegistry } : {}
  );

  let database: DatabaseClients | null = null;
  if (config.supabase) {
    const supabase = createSupabaseServiceClient(config.supabase);
    database = {
      supabase,
      repository: new SupabaseCaseRepository({ supabase }),
      cacheStore: new SupabaseContextCacheStore({ supabase }),
    };
  }

  logger.info(
    { graphragUrl: graphrag.baseUrl, databaseEnabled: database !== null },
    'Integration clients created'
  );

  return { graphrag, database };
}
