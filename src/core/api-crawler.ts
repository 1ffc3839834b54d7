/**
 * API Crawler
 *
 * Orchestrates one documentation crawl:
 *
 *   fetch index → parse index → fetch detail pages (batched) → parse details → generate
 *
 * Only a failed index fetch ends the run early. Every later failure stays
 * local to its resource: it is logged and the resource is skipped (or kept
 * in its index-only form under the `keep-minimal` policy).
 *
 * Two modes share the same parsing and generation:
 * - `batch`: all detail pages are parsed before the first file is written
 * - `streaming`: each resource is written as soon as its batch is parsed
 */

import * as path from 'node:path';
import type { DocumentationParser } from './documentation-parser.js';
import type { PageFetcher } from './documentation-client.js';
import type { ModelGenerator } from './model-generator.js';
import type { ApiResource } from '../types/api-resource.js';
import { CrawlResult } from '../types/crawl-result.js';
import {
  createProgressEvent,
  type CrawlPhase,
  type CrawlProgressEvent,
  type OnCrawlProgress,
} from '../types/progress.js';
import {
  DEFAULT_INDEX_URL,
  type CrawlMode,
  type DetailFailurePolicy,
} from '../utils/config-schemas.js';
import { errorMessage } from '../utils/errors.js';
import { noopLogger, type CrawlLogger } from '../utils/logger.js';
import type { ModelWriter } from '../utils/model-writer.js';
import { getTimeout, sleep } from '../utils/timeouts.js';

// ============================================
// TYPES
// ============================================

export interface ApiCrawlerDependencies {
  client: PageFetcher;
  parser: DocumentationParser;
  generator: ModelGenerator;
  writer: ModelWriter;
  /** Defaults to a logger that discards everything */
  logger?: CrawlLogger;
}

export interface ApiCrawlerOptions {
  /** Index page listing every resource */
  indexUrl?: string;
  /** When files are written relative to fetching (default: batch) */
  mode?: CrawlMode;
  /** Detail pages fetched concurrently per batch (default: 5) */
  maxConcurrentRequests?: number;
  /** Pause between batches in ms (default: 1000) */
  batchDelayMs?: number;
  /**
   * What happens to a resource whose detail page could not be fetched or parsed.
   * `omit` drops it; `keep-minimal` generates it from index data. (default: omit)
   */
  detailFailurePolicy?: DetailFailurePolicy;
  onProgress?: OnCrawlProgress;
  /** Replaces the inter-batch wait, for tests */
  sleepFn?: (ms: number) => Promise<void>;
}

/**
 * Mutable accumulators for one run
 */
interface CrawlRun {
  readonly outputDirectory: string;
  readonly startTime: number;
  readonly detailedResources: ApiResource[];
  readonly generatedFiles: string[];
}

export const DEFAULT_MAX_CONCURRENT_REQUESTS = 5;

// ============================================
// HELPERS
// ============================================

/**
 * Split items into consecutive chunks of at most `size`
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) {
    throw new RangeError(`Chunk size must be at least 1, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Separate resources with a detail page (keyed by URL, first one wins)
 * from those generated from index data alone.
 */
export function partitionByDetailUrl(resources: readonly ApiResource[]): {
  queued: Map<string, ApiResource>;
  passThrough: ApiResource[];
  duplicates: ApiResource[];
} {
  const queued = new Map<string, ApiResource>();
  const passThrough: ApiResource[] = [];
  const duplicates: ApiResource[] = [];

  for (const resource of resources) {
    if (!resource.detailUrl) {
      passThrough.push(resource);
    } else if (queued.has(resource.detailUrl)) {
      duplicates.push(resource);
    } else {
      queued.set(resource.detailUrl, resource);
    }
  }

  return { queued, passThrough, duplicates };
}

// ============================================
// CRAWLER
// ============================================

export class ApiCrawler {
  private readonly client: PageFetcher;
  private readonly parser: DocumentationParser;
  private readonly generator: ModelGenerator;
  private readonly writer: ModelWriter;
  private readonly logger: CrawlLogger;

  private readonly indexUrl: string;
  private readonly mode: CrawlMode;
  private readonly maxConcurrentRequests: number;
  private readonly batchDelayMs: number;
  private readonly detailFailurePolicy: DetailFailurePolicy;
  private readonly onProgress?: OnCrawlProgress;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(dependencies: ApiCrawlerDependencies, options: ApiCrawlerOptions = {}) {
    this.client = dependencies.client;
    this.parser = dependencies.parser;
    this.generator = dependencies.generator;
    this.writer = dependencies.writer;
    this.logger = dependencies.logger ?? noopLogger;

    this.indexUrl = options.indexUrl ?? DEFAULT_INDEX_URL;
    this.mode = options.mode ?? 'batch';
    this.maxConcurrentRequests = options.maxConcurrentRequests ?? DEFAULT_MAX_CONCURRENT_REQUESTS;
    this.batchDelayMs = getTimeout('BATCH_DELAY', options.batchDelayMs);
    this.detailFailurePolicy = options.detailFailurePolicy ?? 'omit';
    this.onProgress = options.onProgress;
    this.sleepFn = options.sleepFn ?? sleep;

    if (!Number.isInteger(this.maxConcurrentRequests) || this.maxConcurrentRequests < 1) {
      throw new RangeError(`maxConcurrentRequests must be a positive integer, got ${this.maxConcurrentRequests}`);
    }
  }

  /**
   * Crawl the documentation and write one model file per resource under `outputDirectory`
   */
  async crawl(outputDirectory: string): Promise<CrawlResult> {
    const run: CrawlRun = {
      outputDirectory,
      startTime: Date.now(),
      detailedResources: [],
      generatedFiles: [],
    };

    this.logger.info('Starting {mode} API documentation crawl', { mode: this.mode, url: this.indexUrl });
    this.emitProgress(run, 'init', 'Crawl started');

    // Step 1: the index page. Failing here is the only fatal error.
    this.emitProgress(run, 'fetch_index', `Fetching ${this.indexUrl}`);
    let indexHtml: string;
    try {
      indexHtml = await this.client.fetchPage(this.indexUrl);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Crawl failed: {message}', { message, url: this.indexUrl, error });
      this.emitProgress(run, 'aborted', 'Index fetch failed', { error: message });
      return CrawlResult.failed(message);
    }

    // Step 2: resources from the index table
    this.emitProgress(run, 'parse_index', 'Parsing resource index');
    const resources = this.parser.parseMainPage(indexHtml);
    this.logger.info('Found {count} resources from main page', { count: resources.length });

    // Step 3: detail pages, generating along the way in streaming mode
    await this.processResources(resources, run);
    this.logger.info('Successfully parsed {count} detailed resources', {
      count: run.detailedResources.length,
    });

    // Step 4: generation in batch mode
    if (this.mode === 'batch') {
      this.emitProgress(run, 'generate', `Generating ${run.detailedResources.length} models`);
      for (const resource of run.detailedResources) {
        await this.generateModel(resource, run);
      }
    }

    this.logger.info('Generated {count} model files', { count: run.generatedFiles.length });
    this.emitProgress(run, 'done', 'Crawl finished', {
      resources: resources.length,
      generatedFiles: run.generatedFiles.length,
    });

    return CrawlResult.succeeded(resources, run.detailedResources, run.generatedFiles);
  }

  private async processResources(resources: readonly ApiResource[], run: CrawlRun): Promise<void> {
    const { queued, passThrough, duplicates } = partitionByDetailUrl(resources);

    for (const duplicate of duplicates) {
      this.logger.debug('Skipping {resource}: detail page {url} already queued', {
        resource: duplicate.name,
        url: duplicate.detailUrl,
      });
    }

    // Resources without a detail page keep their index data
    for (const resource of passThrough) {
      await this.acceptResource(resource, run);
    }

    if (queued.size === 0) {
      this.logger.info('No detailed resource pages to fetch');
      return;
    }

    const batches = chunk([...queued.keys()], this.maxConcurrentRequests);

    for (const [batchIndex, batch] of batches.entries()) {
      this.logger.info('Processing detail batch {index}/{total}', {
        index: batchIndex + 1,
        total: batches.length,
      });
      this.emitProgress(run, 'fetch_details', `Fetching batch ${batchIndex + 1}/${batches.length}`, {
        batch: batchIndex + 1,
        totalBatches: batches.length,
      });

      const pages = await this.fetchBatch(batch);

      this.emitProgress(run, 'parse_details', `Parsing batch ${batchIndex + 1}/${batches.length}`, {
        batch: batchIndex + 1,
        totalBatches: batches.length,
      });

      // Input order, not completion order
      for (const url of batch) {
        const base = queued.get(url);
        if (!base) continue;

        const detailed = this.parseDetailPage(url, pages.get(url), base);
        if (detailed) {
          await this.acceptResource(detailed, run);
        }
      }

      if (batchIndex < batches.length - 1 && this.batchDelayMs > 0) {
        await this.sleepFn(this.batchDelayMs);
      }
    }
  }

  private async fetchBatch(batch: readonly string[]): Promise<Map<string, string>> {
    try {
      return await this.client.fetchPages(batch);
    } catch (error) {
      this.logger.error('Failed to fetch detail batch: {message}', { message: errorMessage(error), error });
      return new Map();
    }
  }

  /**
   * Detailed resource for one URL, the index-only resource under `keep-minimal`,
   * or `null` when the resource is dropped.
   */
  private parseDetailPage(url: string, html: string | undefined, base: ApiResource): ApiResource | null {
    if (html === undefined) {
      this.logger.error('Failed to fetch detail page for {resource} at {url}', { resource: base.name, url });
      return this.fallback(base);
    }

    try {
      const detailed = this.parser.parseDetailPageProperties(html, base);

      if (detailed.properties.length > 0) {
        this.logger.debug('Parsed {count} properties for {resource}', {
          count: detailed.properties.length,
          resource: base.name,
        });
      } else {
        this.logger.warn('No properties found for detailed resource {resource}', { resource: base.name, url });
      }

      return detailed;
    } catch (error) {
      this.logger.error('Failed to parse detailed resource at {url}: {message}', {
        url,
        message: errorMessage(error),
        error,
      });
      return this.fallback(base);
    }
  }

  private fallback(base: ApiResource): ApiResource | null {
    if (this.detailFailurePolicy === 'keep-minimal') {
      this.logger.warn('Keeping index-only model for {resource}', { resource: base.name });
      return base;
    }
    return null;
  }

  private async acceptResource(resource: ApiResource, run: CrawlRun): Promise<void> {
    run.detailedResources.push(resource);
    if (this.mode === 'streaming') {
      await this.generateModel(resource, run);
    }
  }

  /**
   * Generate and write one model. Errors are logged and the resource is skipped,
   * as is a resource whose file an earlier resource already wrote.
   */
  private async generateModel(resource: ApiResource, run: CrawlRun): Promise<void> {
    try {
      const filePath = this.generator.outputPath(resource, run.outputDirectory);
      if (run.generatedFiles.includes(filePath)) {
        this.logger.warn('Skipping {resource}: {path} was already generated for another resource', {
          resource: resource.name,
          path: filePath,
        });
        return;
      }
      const code = this.generator.generate(resource);

      await this.writer.ensureDirectory(path.dirname(filePath));
      await this.writer.writeFile(filePath, code);
      run.generatedFiles.push(filePath);

      this.logger.debug('Generated model {resource} at {path}', { resource: resource.name, path: filePath });
    } catch (error) {
      this.logger.error('Failed to generate model for {resource}: {message}', {
        resource: resource.name,
        message: errorMessage(error),
        error,
      });
    }
  }

  private emitProgress(
    run: CrawlRun,
    phase: CrawlPhase,
    message: string,
    details?: CrawlProgressEvent['details']
  ): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(createProgressEvent(phase, message, run.startTime, details));
    } catch (error) {
      this.logger.warn('Progress callback threw: {message}', { message: errorMessage(error) });
    }
  }
}
