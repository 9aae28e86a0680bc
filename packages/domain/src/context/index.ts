/**
 * Context Module (Domain Layer)
 *
 * Builds the case-centric WHO/WHAT/WHERE/WHEN/WHY context.
 *
 * ## Hexagonal Architecture
 *
 * This module exports:
 * - ContextBuilder: orchestrates the analyzers, scoring and caching
 * - Dimension analyzers: one per dimension
 * - CaseRepository / GraphInsights: ports for persistence and the knowledge graph
 *
 * Adapters are in @casecontext/integrations:
 * - SupabaseCaseRepository
 * - GraphRAGClient
 *
 * @example
 * ```typescript
 * import { createContextBuilder } from '@casecontext/domain';
 * import { SupabaseCaseRepository, createGraphRAGClient } from '@casecontext/integrations';
 *
 * const builder = createContextBuilder({
 *   repository: new SupabaseCaseRepository({ client: supabase }),
 *   graph: createGraphRAGClient({ baseUrl: 'http://localhost:8010' }),
 * });
 * const context = await builder.buildContext({ clientId, caseId, scope: 'standard' });
 * ```
 *
 * @module domain/context
 */

export * from './ports.js';
export * from './in-memory-case-repository.js';
export * from './analyzers/index.js';
export * from './scoring.js';
export * from './context-builder.js';
