/**
 * Environment Validation Schema
 *
 * Zod-based schema providing type-safe validation for all environment variables.
 * Used by loadConfig() for fail-fast boot validation.
 *
 * @module @config/schema
 */

import { z } from 'zod';

// ============================================================================
// Reusable validators
// ============================================================================

/** Unset and empty variables both take the schema default */
function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => (typeof val === 'string' && val.trim() === '' ? undefined : val), schema);
}

const booleanFlag = z.enum(['true', 'false', '1', '0']).transform((val) => val === 'true' || val === '1');

// ============================================================================
// Environment schema
// ============================================================================

export const envSchema = z.object({
  // -- Core --
  NODE_ENV: env(z.enum(['development', 'production', 'test']).default('development')),
  // Read by @kernel/logger on every call; validated here only
  LOG_LEVEL: env(z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional()),
  SERVICE_NAME: env(z.string().min(2).regex(/^[a-zA-Z0-9_-]+$/, {
    message: 'SERVICE_NAME must contain only alphanumeric characters, hyphens, and underscores',
  }).default('document-search')),

  // -- HTTP --
  HOST: env(z.string().min(1).default('0.0.0.0')),
  PORT: env(z.coerce.number().int().min(0).max(65535).default(8000)),
  API_DOCS_ENABLED: env(booleanFlag.optional()),

  // -- Elasticsearch --
  ELASTICSEARCH_URL: env(z.string().url().default('http://localhost:9200')),
  ELASTICSEARCH_INDEX_PREFIX: env(z.string().regex(/^[a-z0-9_-]+$/, {
    message: 'ELASTICSEARCH_INDEX_PREFIX must contain only lowercase letters, digits, hyphens, and underscores',
  }).default('app')),
  ELASTICSEARCH_REQUEST_TIMEOUT_MS: env(z.coerce.number().int().positive().default(20_000)),
  ELASTICSEARCH_MAX_RETRIES: env(z.coerce.number().int().min(0).default(10)),
  ELASTICSEARCH_REFRESH: env(z.enum(['true', 'false', 'wait_for']).default('false')),
  ELASTICSEARCH_CONNECT_ATTEMPTS: env(z.coerce.number().int().min(1).default(5)),
});

export type EnvConfig = z.infer<typeof envSchema>;

// ============================================================================
// Typed application config
// ============================================================================

/** Write refresh policy passed through to the search engine */
export type RefreshPolicy = boolean | 'wait_for';

export interface AppConfig {
  nodeEnv: EnvConfig['NODE_ENV'];
  serviceName: string;
  server: {
    host: string;
    port: number;
  };
  apiDocsEnabled: boolean;
  elasticsearch: {
    url: string;
    requestTimeoutMs: number;
    maxRetries: number;
    refresh: RefreshPolicy;
    connectAttempts: number;
  };
  indexes: {
    articles: string;
    users: string;
  };
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigValidationError';
  }
}

function toRefreshPolicy(value: EnvConfig['ELASTICSEARCH_REFRESH']): RefreshPolicy {
  if (value === 'wait_for') return 'wait_for';
  return value === 'true';
}

/**
 * Validate the environment and build the typed config.
 * @throws ConfigValidationError listing every invalid variable
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const data = result.data;
  const prefix = data.ELASTICSEARCH_INDEX_PREFIX;

  return {
    nodeEnv: data.NODE_ENV,
    serviceName: data.SERVICE_NAME,
    server: {
      host: data.HOST,
      port: data.PORT,
    },
    apiDocsEnabled: data.API_DOCS_ENABLED ?? data.NODE_ENV !== 'production',
    elasticsearch: {
      url: data.ELASTICSEARCH_URL,
      requestTimeoutMs: data.ELASTICSEARCH_REQUEST_TIMEOUT_MS,
      maxRetries: data.ELASTICSEARCH_MAX_RETRIES,
      refresh: toRefreshPolicy(data.ELASTICSEARCH_REFRESH),
      connectAttempts: data.ELASTICSEARCH_CONNECT_ATTEMPTS,
    },
    indexes: {
      articles: `${prefix}_articles`,
      users: `${prefix}_users`,
    },
  };
}
