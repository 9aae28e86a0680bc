/**
 * Case Context Types Package
 *
 * Zod schemas and inferred types for the five context dimensions, the
 * assembled context, persistence rows, GraphRAG responses and API requests.
 *
 * @module @casecontext/types
 */

export * from './schemas/index.js';
export * from './context-model.js';
