/**
 * @fileoverview Prometheus metrics for the context engine
 *
 * Each app instance owns a dedicated registry so tests and embedded servers
 * never share counters.
 *
 * @module metrics
 */

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const METRICS_PREFIX = 'context_engine_';

export interface ApiMetrics {
  registry: Registry;
  /** Labels: endpoint (route pattern), method */
  requestsTotal: Counter<'endpoint' | 'method'>;
  /** Labels: endpoint */
  requestLatency: Histogram<'endpoint'>;
  /** Labels: tier (memory/redis/database) */
  cacheHits: Counter<'tier'>;
  /** 1 = healthy, 0 = unhealthy or not configured */
  dependencyHealth: Gauge<'dependency'>;
  /** Labels: scope (minimal/standard/comprehensive/custom), complete */
  contextBuilds: Counter<'scope' | 'complete'>;
  contextScore: Histogram;
}

export function createApiMetrics(options: { collectDefaults?: boolean } = {}): ApiMetrics {
  const registry = new Registry();

  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry, prefix: METRICS_PREFIX });
  }

  return {
    registry,
    requestsTotal: new Counter({
      name: `${METRICS_PREFIX}requests_total`,
      help: 'Total HTTP requests handled',
      labelNames: ['endpoint', 'method'],
      registers: [registry],
    }),
    requestLatency: new Histogram({
      name: `${METRICS_PREFIX}request_latency_seconds`,
      help: 'HTTP request latency in seconds',
      labelNames: ['endpoint'],
      buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [registry],
    }),
    cacheHits: new Counter({
      name: `${METRICS_PREFIX}cache_hits_total`,
      help: 'Context cache hits by tier',
      labelNames: ['tier'],
      registers: [registry],
    }),
    dependencyHealth: new Gauge({
      name: `${METRICS_PREFIX}dependency_health`,
      help: 'Dependency health (1=healthy, 0=unhealthy)',
      labelNames: ['dependency'],
      registers: [registry],
    }),
    contextBuilds: new Counter({
      name: `${METRICS_PREFIX}context_builds_total`,
      help: 'Contexts built (cache misses and refreshes)',
      labelNames: ['scope', 'complete'],
      registers: [registry],
    }),
    contextScore: new Histogram({
      name: `${METRICS_PREFIX}context_score`,
      help: 'Completeness score of built contexts',
      buckets: [0.1, 0.25, 0.5, 0.7, 0.85, 0.95, 1],
      registers: [registry],
    }),
  };
}
