/**
 * The `generate` command: wires configuration, logging and the crawler
 * together and reports the outcome. Returns the process exit code.
 */

import { ApiCrawler } from './core/api-crawler.js';
import { DocumentationClient, type FetchFn } from './core/documentation-client.js';
import { DocumentationParser } from './core/documentation-parser.js';
import { createEmitter } from './core/emitters/index.js';
import { ModelGenerator } from './core/model-generator.js';
import type { CrawlStatistics } from './types/crawl-result.js';
import {
  ConfigValidationError,
  type CrawlMode,
  type CrawlerConfig,
  type EmitTarget,
} from './utils/config-schemas.js';
import { parseCrawlerConfig, parseLogConfig } from './utils/env-parser.js';
import {
  indexFetchFailedError,
  noResourcesFoundError,
  partialGenerationWarning,
} from './utils/error-messages.js';
import { createLogger, type CrawlLogger } from './utils/logger.js';
import { FileSystemModelWriter, type ModelWriter } from './utils/model-writer.js';

export interface GenerateCommandOptions {
  output: string;
  mode: CrawlMode;
  target: EmitTarget;
  verbose?: boolean;
  logFile?: string;
  concurrency?: number;
  delay?: number;
  indexUrl?: string;
  keepMinimal?: boolean;
}

/**
 * Process boundaries, replaceable in tests
 */
export interface GenerateCommandIO {
  env?: Record<string, string | undefined>;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  fetchFn?: FetchFn;
  writer?: ModelWriter;
  logger?: CrawlLogger;
}

export function formatStatistics(stats: CrawlStatistics, outputDirectory: string): string[] {
  return [
    'API model generation finished',
    `  Resources found:     ${stats.totalResources}`,
    `  Detailed resources:  ${stats.detailedResources}`,
    `  Files generated:     ${stats.generatedFiles}`,
    `  Output directory:    ${outputDirectory}`,
  ];
}

export async function runGenerate(options: GenerateCommandOptions, io: GenerateCommandIO = {}): Promise<number> {
  const env = io.env ?? process.env;
  const stdout = io.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const stderr = io.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  let config: CrawlerConfig;
  let loggerFor: (component: string) => CrawlLogger;
  try {
    const logConfig = parseLogConfig(env);
    config = parseCrawlerConfig(env, {
      indexUrl: options.indexUrl,
      maxConcurrentRequests: options.concurrency,
      batchDelayMs: options.delay,
      detailFailurePolicy: options.keepMinimal ? 'keep-minimal' : undefined,
    });
    if (io.logger) {
      const injected = io.logger;
      loggerFor = () => injected;
    } else {
      const root = createLogger('generate', {
        level: options.verbose ? 'debug' : logConfig.level,
        prettyPrint: logConfig.prettyPrint,
        logFile: options.logFile,
      });
      loggerFor = (component) => root.create(component);
    }
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      stderr(error.message);
      return 1;
    }
    throw error;
  }

  const crawler = new ApiCrawler(
    {
      client: new DocumentationClient({
        fetchFn: io.fetchFn,
        timeout: config.requestTimeoutMs,
        userAgent: config.userAgent,
        logger: loggerFor('client'),
      }),
      parser: new DocumentationParser({ docsBaseUrl: config.docsBaseUrl, logger: loggerFor('parser') }),
      generator: new ModelGenerator(createEmitter(options.target)),
      writer: io.writer ?? new FileSystemModelWriter(),
      logger: loggerFor('crawler'),
    },
    {
      indexUrl: config.indexUrl,
      mode: options.mode,
      maxConcurrentRequests: config.maxConcurrentRequests,
      batchDelayMs: config.batchDelayMs,
      detailFailurePolicy: config.detailFailurePolicy,
    }
  );

  const result = await crawler.crawl(options.output);

  if (!result.success) {
    stderr(indexFetchFailedError(config.indexUrl, result.error ?? 'unknown error'));
    return 1;
  }

  const stats = result.getStatistics();
  for (const line of formatStatistics(stats, options.output)) {
    stdout(line);
  }

  if (stats.totalResources === 0) {
    stderr(noResourcesFoundError(config.indexUrl));
  } else if (stats.generatedFiles < stats.totalResources) {
    stderr(partialGenerationWarning(stats.totalResources, stats.generatedFiles));
  }

  return 0;
}
