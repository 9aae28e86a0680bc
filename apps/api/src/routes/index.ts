export { createHealthRoutes, SERVICE_NAME, SERVICE_VERSION, type DependencyHealth } from './health.js';
export { createMetricsRoutes } from './metrics.js';
export { createContextRoutes } from './context.js';
export { createCacheRoutes } from './cache.js';
