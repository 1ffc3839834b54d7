/**
 * apidoc-codegen
 *
 * Turns HTML REST API documentation into model classes:
 * - Index and detail table parsing with markup fallbacks
 * - Batched, rate-limited detail page fetching
 * - Deterministic TypeScript (default) or PHP model output
 */

// Crawl orchestration
export {
  ApiCrawler,
  chunk,
  partitionByDetailUrl,
  DEFAULT_MAX_CONCURRENT_REQUESTS,
  type ApiCrawlerDependencies,
  type ApiCrawlerOptions,
} from './core/api-crawler.js';

// Fetching
export {
  DocumentationClient,
  type DocumentationClientOptions,
  type FetchFn,
  type PageFetcher,
} from './core/documentation-client.js';

// Parsing
export {
  DocumentationParser,
  HEADER_STRATEGIES,
  ROW_STRATEGIES,
  INDEX_TABLE_HEADERS,
  UNKNOWN_RESOURCE_NAME,
  type DocumentationParserOptions,
  type TableStrategy,
} from './core/documentation-parser.js';
export { normalizeType, propertyNameFrom, KNOWN_ACRONYMS } from './core/type-normalizer.js';

// Generation
export { ModelGenerator } from './core/model-generator.js';
export * from './core/emitters/index.js';

// Types
export * from './types/api-resource.js';
export * from './types/progress.js';
export { CrawlResult, type CrawlStatistics } from './types/crawl-result.js';

// Ambient
export * from './utils/errors.js';
export * from './utils/config-schemas.js';
export { parseCrawlerConfig, parseLogConfig, type CrawlerConfigOverrides } from './utils/env-parser.js';
export { createLogger, noopLogger, Logger, type CrawlLogger, type LogContext, type LoggerConfig } from './utils/logger.js';
export { FileSystemModelWriter, InMemoryModelWriter, type ModelWriter } from './utils/model-writer.js';
export { runGenerate, type GenerateCommandOptions, type GenerateCommandIO } from './generate-command.js';
