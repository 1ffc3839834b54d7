/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access; command-line flags are layered on top
 * as overrides before validation.
 */

import {
  logConfigSchema,
  crawlerConfigSchema,
  ConfigValidationError,
  type LogConfig,
  type CrawlerConfig,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

/**
 * Values supplied on the command line. Undefined entries fall back to the environment.
 */
export type CrawlerConfigOverrides = {
  [K in keyof CrawlerConfig]?: CrawlerConfig[K] | undefined;
};

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToCrawlerConfig(env: Env) {
  return {
    indexUrl: env.CODEGEN_INDEX_URL,
    docsBaseUrl: env.CODEGEN_DOCS_BASE_URL,
    maxConcurrentRequests: env.CODEGEN_MAX_CONCURRENT,
    batchDelayMs: env.CODEGEN_BATCH_DELAY_MS,
    requestTimeoutMs: env.CODEGEN_REQUEST_TIMEOUT_MS,
    userAgent: env.CODEGEN_USER_AGENT,
    detailFailurePolicy: env.CODEGEN_DETAIL_FAILURE_POLICY,
  };
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined)
  );
}

// ============================================
// CONFIG PARSERS
// ============================================

/**
 * Parse and validate logging configuration from environment.
 */
export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

/**
 * Parse and validate crawler configuration from environment plus overrides.
 */
export function parseCrawlerConfig(
  env: Env = process.env,
  overrides: CrawlerConfigOverrides = {}
): CrawlerConfig {
  const input = {
    ...withoutUndefined(mapEnvToCrawlerConfig(env)),
    ...withoutUndefined(overrides),
  };
  const result = crawlerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError('crawler', result.error);
  }
  return result.data;
}
