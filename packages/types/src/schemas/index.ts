/**
 * Central export point for all schemas
 */

// =============================================================================
// Context dimensions
// =============================================================================
export * from './dimensions.js';

// =============================================================================
// Assembled context
// =============================================================================
export * from './context.js';

// =============================================================================
// Persistence rows
// =============================================================================
export * from './records.js';

// =============================================================================
// GraphRAG service
// =============================================================================
export * from './graphrag.js';

// =============================================================================
// HTTP requests
// =============================================================================
export * from './api.js';
