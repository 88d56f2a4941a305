import { z } from 'zod';
import { CounterError, CounterErrorCode } from './types.js';

const NODE_ADDRESS = /^(redis|rediss|memory):\/\/.+/;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Storage nodes
  redisNodes: z
    .array(
      z.string().regex(NODE_ADDRESS, 'must start with redis://, rediss:// or memory://')
    )
    .min(1, 'REDIS_NODES must list at least one node'),
  redisPassword: z.string().optional(),
  redisDb: z.number().int().min(0).max(15).default(0),
  redisKeyPrefix: z.string().default('visits:'),
  redisCommandTimeoutMs: z.number().int().min(10).max(60_000).default(5000),
  redisConnectTimeoutMs: z.number().int().min(100).max(60_000).default(5000),
  redisRetryAttempts: z.number().int().min(1).max(10).default(3),
  redisRetryBaseDelayMs: z.number().int().min(0).max(10_000).default(100),

  // Hash ring
  virtualNodes: z.number().int().min(1).max(1000).default(100),

  // Cache
  cacheTtlMs: z.number().int().min(1).default(5000),
  cacheCapacity: z.number().int().min(1).default(1000),

  // Batch writer
  batchIntervalMs: z.number().int().min(10).default(5000),
  batchSizeLimit: z.number().int().min(1).default(1000),

  // Background work
  healthProbeIntervalMs: z.number().int().min(100).default(30_000),
  shutdownGraceMs: z.number().int().min(0).default(10_000),

  // HTTP
  port: z.number().int().min(1).max(65535).default(8000),
  apiPrefix: z.string().regex(/^\/[\w\-/]*$/, 'API_PREFIX must start with /').default('/api/v1'),
  metricsEnabled: z.boolean().default(true),

  // Environment
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

export const DEFAULT_REDIS_NODES = 'redis://redis1:6379,redis://redis2:6379,redis://redis3:6379';

function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  // NaN is left for the schema to report
  return Number(value);
}

function parseBoolEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value === 'true' || value === '1';
}

function parseListEnv(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse environment variables into configuration
 * @throws CounterError INVALID_CONFIG listing every failed field
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    redisNodes: parseListEnv(env['REDIS_NODES'] ?? DEFAULT_REDIS_NODES),
    redisPassword: env['REDIS_PASSWORD'] || undefined,
    redisDb: parseIntEnv(env['REDIS_DB']),
    redisKeyPrefix: env['REDIS_KEY_PREFIX'] || undefined,
    redisCommandTimeoutMs: parseIntEnv(env['REDIS_COMMAND_TIMEOUT_MS']),
    redisConnectTimeoutMs: parseIntEnv(env['REDIS_CONNECT_TIMEOUT_MS']),
    redisRetryAttempts: parseIntEnv(env['REDIS_RETRY_ATTEMPTS']),
    redisRetryBaseDelayMs: parseIntEnv(env['REDIS_RETRY_BASE_DELAY_MS']),
    virtualNodes: parseIntEnv(env['VIRTUAL_NODES']),
    cacheTtlMs: parseIntEnv(env['CACHE_TTL_MS']),
    cacheCapacity: parseIntEnv(env['CACHE_CAPACITY']),
    batchIntervalMs: parseIntEnv(env['BATCH_INTERVAL_MS']),
    batchSizeLimit: parseIntEnv(env['BATCH_SIZE_LIMIT']),
    healthProbeIntervalMs: parseIntEnv(env['HEALTH_PROBE_INTERVAL_MS']),
    shutdownGraceMs: parseIntEnv(env['SHUTDOWN_GRACE_MS']),
    port: parseIntEnv(env['PORT']),
    apiPrefix: env['API_PREFIX'] || undefined,
    metricsEnabled: parseBoolEnv(env['METRICS_ENABLED']),
    nodeEnv: env['NODE_ENV'] || undefined,
    logLevel: env['LOG_LEVEL'] || undefined,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new CounterError(
      CounterErrorCode.INVALID_CONFIG,
      `Configuration validation failed:\n${errors.join('\n')}`,
      { errors }
    );
  }

  return result.data;
}
