/**
 * Application configuration
 *
 * Loads and validates environment variables
 */

import { z } from 'zod';

const OptionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

export const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8015),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    GRAPHRAG_URL: z.string().url().default('http://localhost:8010'),
    GRAPHRAG_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),
    GRAPHRAG_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

    SUPABASE_URL: OptionalString.pipe(z.string().url().optional()),
    SUPABASE_SERVICE_KEY: OptionalString,
    REDIS_URL: OptionalString,

    CACHE_MEMORY_MAX_SIZE: z.coerce.number().int().min(1).default(1000),
    CACHE_MEMORY_TTL_SECONDS: z.coerce.number().int().min(1).default(600),

    CORS_ORIGIN: OptionalString,
    RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(300),
    RATE_LIMIT_ALLOWLIST: OptionalString,
  })
  .refine((env) => (env.SUPABASE_URL === undefined) === (env.SUPABASE_SERVICE_KEY === undefined), {
    message: 'SUPABASE_URL and SUPABASE_SERVICE_KEY must be set together',
    path: ['SUPABASE_SERVICE_KEY'],
  });

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  isDev: boolean;
  isProd: boolean;
  isTest: boolean;
  server: {
    port: number;
    host: string;
  };
  logger: {
    level: Env['LOG_LEVEL'];
  };
  graphrag: {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
  };
  /** null when no database is configured */
  supabase: { url: string; serviceKey: string } | null;
  redisUrl: string | null;
  cache: {
    memoryMaxSize: number;
    memoryTtlSeconds: number;
  };
  cors: {
    origins: string[] | false;
  };
  rateLimit: {
    max: number;
    /** Client IPs exempt from rate limiting */
    allowlist: string[];
  };
}

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Comma-separated origins; unset disables CORS
 */
export function parseCorsOrigins(value: string | undefined): string[] | false {
  const origins = parseList(value);

  for (const origin of origins) {
    if (origin === '*') {
      throw new Error('CORS_ORIGIN must list explicit origins, not "*"');
    }
    try {
      new URL(origin);
    } catch (error) {
      throw new Error(`Invalid CORS origin: ${origin}`, { cause: error });
    }
  }

  return origins.length > 0 ? origins : false;
}

/**
 * Parse an environment into the application config; throws ZodError when invalid
 */
export function parseConfig(source: Record<string, string | undefined>): AppConfig {
  const env = EnvSchema.parse(source);

  return {
    env: env.NODE_ENV,
    isDev: env.NODE_ENV === 'development',
    isProd: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
    server: {
      port: env.PORT,
      host: env.HOST,
    },
    logger: {
      level: env.LOG_LEVEL,
    },
    graphrag: {
      baseUrl: env.GRAPHRAG_URL,
      timeoutMs: env.GRAPHRAG_TIMEOUT_MS,
      maxRetries: env.GRAPHRAG_MAX_RETRIES,
    },
    supabase:
      env.SUPABASE_URL !== undefined && env.SUPABASE_SERVICE_KEY !== undefined
        ? { url: env.SUPABASE_URL, serviceKey: env.SUPABASE_SERVICE_KEY }
        : null,
    redisUrl: env.REDIS_URL ?? null,
    cache: {
      memoryMaxSize: env.CACHE_MEMORY_MAX_SIZE,
      memoryTtlSeconds: env.CACHE_MEMORY_TTL_SECONDS,
    },
    cors: {
      origins: parseCorsOrigins(env.CORS_ORIGIN),
    },
    rateLimit: {
      max: env.RATE_LIMIT_MAX,
      allowlist: parseList(env.RATE_LIMIT_ALLOWLIST),
    },
  };
}

/**
 * Load config from process.env, exiting on an invalid environment
 */
export function loadConfig(): AppConfig {
  const result = EnvSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Invalid environment configuration:');
    console.error(result.error.format());
    process.exit(1);
  }

  return parseConfig(process.env);
}
