/**
 * ╔══════════════════════════════════════════════════════════════════════════════╗
 * ║                         @casecontext/integrations                             ║
 * ║                                                                               ║
 * ║  Adapters between the context engine and the services around it:             ║
 * ║  - GraphRAG knowledge graph client (retry + circuit breaker)                  ║
 * ║  - Supabase case repository (domain CaseRepository port)                      ║
 * ║  - Supabase database tier for the context cache                               ║
 * ╚══════════════════════════════════════════════════════════════════════════════╝
 */

// =============================================================================
// GraphRAG
// =============================================================================

export {
  GraphRAGClient,
  GraphRAGClientConfigSchema,
  GraphRAGTransportError,
  GRAPHRAG_CIRCUIT_NAME,
  createGraphRAGClient,
  type GraphRAGClientConfig,
  type GraphRAGClientOptions,
  type GraphRAGHealth,
  type CaseEntitiesQuery,
  type CaseRelationshipsQuery,
  type CaseCommunitiesQuery,
  type CreateCaseGraphInput,
  type GraphBuildOptions,
  type LegalResearchQuery,
  type SimilarCasesQuery,
  type PrecedentSearch,
  type GraphStatsQuery,
  type VisualizationQuery,
} from './graphrag.js';

// =============================================================================
// Supabase
// =============================================================================

export {
  SupabaseConfigSchema,
  createSupabaseServiceClient,
  type SupabaseConfig,
} from './supabase.js';

export {
  SupabaseCaseRepository,
  createSupabaseCaseRepository,
  type SupabaseCaseRepositoryDeps,
} from './supabase-case-repository.js';

export {
  SupabaseContextCacheStore,
  createSupabaseContextCacheStore,
  type SupabaseContextCacheStoreDeps,
} from './supabase-context-cache-store.js';

// =============================================================================
// Factory
// =============================================================================

export {
  createIntegrationClients,
  type IntegrationClients,
  type IntegrationClientsConfig,
  type DatabaseClients,
} from './clients-factory.js';
