/**
 * Test wiring: seeded in-memory repository, fake knowledge graph and Redis
 */

import type { FastifyInstance } from 'fastify';
import { InMemoryCaseRepository } from '@casecontext/domain';
import type { CaseGraphQuery } from '@casecontext/domain';
import type { GraphRAGHealth } from '@casecontext/integrations';
import type { GraphQueryResponse } from '@casecontext/types';
import { buildApp } from '../app.js';
import { parseConfig, type AppConfig } from '../config.js';
import { createApiMetrics, type ApiMetrics } from '../metrics.js';
import {
  assembleServices,
  type ContextServices,
  type GraphService,
  type RedisClient,
} from '../services.js';

export const CLIENT_ID = 'client-1';
/** Closed case: ten parties and a known location */
export const FULL_CASE_ID = 'case-full';
/** Nothing stored */
export const EMPTY_CASE_ID = 'case-empty';

export const testConfig = parseConfig({ NODE_ENV: 'test', LOG_LEVEL: 'silent' });

export function createSeededRepository(): InMemoryCaseRepository {
  const repository = new InMemoryCaseRepository();

  repository.seed(CLIENT_ID, FULL_CASE_ID, {
    record: {
      id: FULL_CASE_ID,
      client_id: CLIENT_ID,
      case_name: 'State v. Roe',
      status: 'closed',
      jurisdiction: 'Federal',
      court: 'District Court',
      venue: 'Oakland',
    },
    nodes: Array.from({ length: 10 }, (_, i) => ({
      node_id: `p-${i}`,
      entity_type: 'PARTY',
      properties: { name: `Party ${i}`, role: i % 2 === 0 ? 'plaintiff' : 'defendant' },
    })),
  });

  return repository;
}

export class FakeGraph implements GraphService {
  calls: CaseGraphQuery[] = [];
  health: GraphRAGHealth = { status: 'healthy', ready: true };

  queryCaseGraph(query: CaseGraphQuery): Promise<GraphQueryResponse> {
    this.calls.push(query);
    return Promise.resolve({
      query: query.query,
      search_type: query.searchType ?? 'LOCAL',
      mode: 'LAZY_GRAPHRAG',
      response: '',
      entities: [],
      relationships: [],
      communities: null,
      metadata: {},
      precedents: [],
      execution_time_ms: 1,
    });
  }

  healthCheck(): Promise<GraphRAGHealth> {
    return Promise.resolve(this.health);
  }
}

/**
 * In-memory Redis with the subset of commands the service uses
 */
export class FakeRedis implements RedisClient {
  readonly entries = new Map<string, { value: string; ttlSeconds: number }>();
  healthy = true;
  closed = false;

  get(key: string): Promise<string | null> {
    return Promise.resolve(this.entries.get(key)?.value ?? null);
  }

  setex(key: string, seconds: number, value: string): Promise<'OK'> {
    this.entries.set(key, { value, ttlSeconds: seconds });
    return Promise.resolve('OK');
  }

  del(...keys: string[]): Promise<number> {
    return Promise.resolve(keys.filter((key) => this.entries.delete(key)).length);
  }

  ping(): Promise<string> {
    return this.healthy ? Promise.resolve('PONG') : Promise.reject(new Error('Connection refused'));
  }

  quit(): Promise<'OK'> {
    this.closed = true;
    return Promise.resolve('OK');
  }
}

export interface TestContext {
  app: FastifyInstance;
  services: ContextServices;
  metrics: ApiMetrics;
  graph: FakeGraph;
}

export async function buildTestApp(
  options: {
    redis?: RedisClient;
    databasePing?: () => Promise<void>;
    services?: (defaults: ContextServices) => ContextServices;
    config?: AppConfig;
  } = {}
): Promise<TestContext> {
  const metrics = createApiMetrics({ collectDefaults: false });
  const graph = new FakeGraph();
  const defaults = assembleServices({
    repository: createSeededRepository(),
    graph,
    metrics,
    redis: options.redis ?? null,
    databasePing: options.databasePing ?? null,
  });
  const services = options.services ? options.services(defaults) : defaults;

  const app = await buildApp({
    config: options.config ?? testConfig,
    services,
    metrics,
    logger: false,
  });
  await app.ready();

  return { app, services, metrics, graph };
}
