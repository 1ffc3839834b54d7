/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  const { min, max } = options;
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return schema.default(options.default);
}

/**
 * Schema for a valid URL string.
 */
export const urlSchema = z.string().url();

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// CRAWLER CONFIGURATION
// ============================================

export const DEFAULT_INDEX_URL = 'https://start.exactonline.nl/docs/HlpRestAPIResources.aspx';
export const DEFAULT_DOCS_BASE_URL = 'https://start.exactonline.nl/docs/';

export const crawlModeSchema = z.enum(['batch', 'streaming']);
export type CrawlMode = z.infer<typeof crawlModeSchema>;

export const detailFailurePolicySchema = z.enum(['omit', 'keep-minimal']);
export type DetailFailurePolicy = z.infer<typeof detailFailurePolicySchema>;

export const emitTargetSchema = z.enum(['ts', 'php']);
export type EmitTarget = z.infer<typeof emitTargetSchema>;

export const crawlerConfigSchema = z.object({
  indexUrl: urlSchema.default(DEFAULT_INDEX_URL),
  docsBaseUrl: urlSchema.default(DEFAULT_DOCS_BASE_URL),
  maxConcurrentRequests: integerStringSchema({ min: 1, max: 50, default: 5 }),
  batchDelayMs: integerStringSchema({ min: 0, max: 60000, default: 1000 }),
  requestTimeoutMs: integerStringSchema({ min: 1000, max: 300000, default: 30000 }),
  userAgent: z.string().min(1).default('apidoc-codegen/1.0.0'),
  detailFailurePolicy: detailFailurePolicySchema.default('omit'),
});

export type CrawlerConfig = z.infer<typeof crawlerConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or command-line options.`
    );
    this.name = 'ConfigValidationError';
  }
}
