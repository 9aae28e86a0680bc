/**
 * @fileoverview Domain Package Exports
 *
 * Context construction for legal cases: dimension analyzers, scoring,
 * the context builder and the ports its adapters implement.
 *
 * @module @casecontext/domain
 */

export * from './context/index.js';
