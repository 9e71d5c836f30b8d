/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Sales data
  SALES_FILE_PATH: Type.String({ minLength: 1, default: 'data/TblVenta.csv' }),
  GEO_CLUSTER_PRECISION: Type.Integer({ default: 3 }),
  DEFAULT_REVENUE_FIELD: Type.Union(
    [
      Type.Literal('revenueInvoiced'),
      Type.Literal('revenueLine'),
      Type.Literal('revenueDefault'),
    ],
    { default: 'revenueInvoiced' }
  ),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),

  // Cluster cache
  CLUSTER_CACHE_MAX_ENTRIES: Type.Integer({ default: 100, minimum: 1 }),
  CLUSTER_CACHE_TTL_MS: Type.Integer({ default: 3_600_000, minimum: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const parseIntOr = (value: string | undefined, fallback: number): number =>
  value !== undefined && value !== '' ? Number(value) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseIntOr(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    SALES_FILE_PATH: env['SALES_FILE_PATH'] ?? 'data/TblVenta.csv',
    GEO_CLUSTER_PRECISION: parseIntOr(env['GEO_CLUSTER_PRECISION'], 3),
    DEFAULT_REVENUE_FIELD: env['DEFAULT_REVENUE_FIELD'] ?? 'revenueInvoiced',
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    CLUSTER_CACHE_MAX_ENTRIES: parseIntOr(env['CLUSTER_CACHE_MAX_ENTRIES'], 100),
    CLUSTER_CACHE_TTL_MS: parseIntOr(env['CLUSTER_CACHE_TTL_MS'], 3_600_000),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  sales: {
    /** `;`-delimited export read once per load */
    filePath: env.SALES_FILE_PATH,
    /** Decimal digits used for the per-record cluster key and as the default map precision */
    geoClusterPrecision: env.GEO_CLUSTER_PRECISION,
    defaultRevenueField: env.DEFAULT_REVENUE_FIELD,
  },
  cors: {
    /** Comma-separated origins allowed in every environment */
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
  clusterCache: {
    maxEntries: env.CLUSTER_CACHE_MAX_ENTRIES,
    ttlMs: env.CLUSTER_CACHE_TTL_MS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
