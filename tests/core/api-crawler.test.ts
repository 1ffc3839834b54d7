/**
 * Tests for the crawl orchestrator
 *
 * A fake documentation site stands in for HTTP. Generated files land in an
 * in-memory writer.
 */

import { describe, it, expect, vi } from 'vitest';
import * as path from 'node:path';
import {
  ApiCrawler,
  chunk,
  partitionByDetailUrl,
  type ApiCrawlerOptions,
} from '../../src/core/api-crawler.js';
import { DocumentationClient, type FetchFn } from '../../src/core/documentation-client.js';
import { DocumentationParser } from '../../src/core/documentation-parser.js';
import { PhpEmitter } from '../../src/core/emitters/php-emitter.js';
import { ModelGenerator } from '../../src/core/model-generator.js';
import { createResource } from '../../src/types/api-resource.js';
import type { CrawlProgressEvent } from '../../src/types/progress.js';
import { InMemoryModelWriter } from '../../src/utils/model-writer.js';
import {
  DETAIL_PAGES,
  DOCS,
  INDEX_URL,
  THREE_RESOURCES,
  FakeDocsSite,
  RecordingLogger,
  detailPage,
  indexPage,
} from '../fixtures/docs-site.js';

const OUT = '/out';

function outPath(...segments: string[]): string {
  return path.join(OUT, 'Models', ...segments);
}

function setup(pages: Record<string, string>, options: ApiCrawlerOptions = {}) {
  const site = new FakeDocsSite(new Map(Object.entries(pages)));
  const writer = new InMemoryModelWriter();
  const logger = new RecordingLogger();
  const sleepFn = vi.fn(async (_ms: number) => {});
  const crawler = new ApiCrawler(
    {
      client: site,
      parser: new DocumentationParser({ docsBaseUrl: DOCS }),
      generator: new ModelGenerator(),
      writer,
      logger,
    },
    { indexUrl: INDEX_URL, batchDelayMs: 0, sleepFn, ...options }
  );
  return { site, writer, logger, sleepFn, crawler };
}

// ============================================
// TESTS
// ============================================

describe('ApiCrawler', () => {
  describe('crawl', () => {
    it('generates one model per documented resource', async () => {
      const { crawler, writer } = setup({ [INDEX_URL]: THREE_RESOURCES, ...DETAIL_PAGES });

      const result = await crawler.crawl(OUT);

      expect(result.getStatistics()).toEqual({
        totalResources: 3,
        detailedResources: 3,
        generatedFiles: 3,
        success: true,
      });
      expect(result.generatedFiles).toEqual([
        outPath('Crm', 'Accounts.ts'),
        outPath('Crm', 'Contacts.ts'),
        outPath('Financial', 'GLAccounts.ts'),
      ]);
      expect([...writer.files.keys()]).toEqual(result.generatedFiles);
      expect(writer.directories).toEqual(new Set([outPath('Crm'), outPath('Financial')]));
    });

    it('writes the properties parsed from detail pages', async () => {
      const { crawler, writer } = setup({ [INDEX_URL]: THREE_RESOURCES, ...DETAIL_PAGES });

      const result = await crawler.crawl(OUT);

      expect(result.detailedResources[0].description).toBe('Accounts resource.');
      expect(result.detailedResources[0].properties.map((p) => p.name)).toEqual(['ID', 'Name']);
      expect(writer.files.get(outPath('Financial', 'GLAccounts.ts'))).toContain('  readonly balance: number | null;\n');
    });

    it('skips a resource whose detail page fails and logs the failure', async () => {
      const { [`${DOCS}details/Contacts`]: _missing, ...pages } = DETAIL_PAGES;
      const { crawler, writer, logger } = setup({ [INDEX_URL]: THREE_RESOURCES, ...pages });

      const result = await crawler.crawl(OUT);

      expect(result.success).toBe(true);
      expect(result.detailedResources.map((r) => r.name)).toEqual(['Accounts', 'GLAccounts']);
      expect(writer.files.has(outPath('Crm', 'Contacts.ts'))).toBe(false);
      expect(logger.messages('error')).toEqual([
        'Failed to fetch detail page for Contacts at https://docs.example.test/details/Contacts',
      ]);
    });

    it('keeps an index-only model under the keep-minimal policy', async () => {
      const { [`${DOCS}details/Contacts`]: _missing, ...pages } = DETAIL_PAGES;
      const { crawler, writer, logger } = setup(
        { [INDEX_URL]: THREE_RESOURCES, ...pages },
        { detailFailurePolicy: 'keep-minimal' }
      );

      const result = await crawler.crawl(OUT);

      expect(result.getStatistics().generatedFiles).toBe(3);
      const contacts = writer.files.get(outPath('Crm', 'Contacts.ts'));
      expect(contacts?.startsWith('/**\n * API endpoint for CRM - Contacts\n')).toBe(true);
      expect(contacts).toContain('  constructor() {}\n');
      expect(logger.messages('warn')).toContain('Keeping index-only model for Contacts');
    });

    it('produces the same files in streaming and batch mode', async () => {
      const index = indexPage([
        { service: 'System', name: 'Me' },
        { service: 'CRM', name: 'Accounts', href: 'details/Accounts' },
        { service: 'CRM', name: 'Contacts', href: 'details/Contacts' },
        { service: 'CRM', name: 'Quotes', href: 'details/Quotes' },
        { service: 'Financial', name: 'GLAccounts', href: 'details/GLAccounts' },
      ]);
      const pages = { [INDEX_URL]: index, ...DETAIL_PAGES };

      const batch = setup(pages, { mode: 'batch', maxConcurrentRequests: 2 });
      const streaming = setup(pages, { mode: 'streaming', maxConcurrentRequests: 2 });

      const batchResult = await batch.crawler.crawl(OUT);
      const streamingResult = await streaming.crawler.crawl(OUT);

      expect(streamingResult.generatedFiles).toEqual(batchResult.generatedFiles);
      expect([...streaming.writer.files.entries()]).toEqual([...batch.writer.files.entries()]);
      expect(batchResult.generatedFiles).toHaveLength(4);
    });

    it('writes resources without a detail page first in streaming mode', async () => {
      const index = indexPage([
        { service: 'CRM', name: 'Accounts', href: 'details/Accounts' },
        { service: 'System', name: 'Me' },
      ]);
      const { crawler, writer, site } = setup({ [INDEX_URL]: index, ...DETAIL_PAGES }, { mode: 'streaming' });

      await crawler.crawl(OUT);

      expect([...writer.files.keys()]).toEqual([outPath('System', 'Me.ts'), outPath('Crm', 'Accounts.ts')]);
      expect(site.batches).toEqual([[`${DOCS}details/Accounts`]]);
    });

    it('fetches detail pages in sequential batches with a pause between them', async () => {
      const names = ['A1', 'A2', 'A3', 'A4', 'A5'];
      const index = indexPage(names.map((name) => ({ service: 'CRM', name, href: `details/${name}` })));
      const pages: Record<string, string> = { [INDEX_URL]: index };
      for (const name of names) {
        pages[`${DOCS}details/${name}`] = detailPage(name, [['ID', 'Edm.Guid', true]]);
      }
      const { crawler, site, sleepFn } = setup(pages, { maxConcurrentRequests: 2, batchDelayMs: 250 });

      const result = await crawler.crawl(OUT);

      expect(site.batches.map((batch) => batch.length)).toEqual([2, 2, 1]);
      expect(site.batches.flat()).toEqual(names.map((name) => `${DOCS}details/${name}`));
      expect(sleepFn.mock.calls).toEqual([[250], [250]]);
      expect(result.generatedFiles).toHaveLength(5);
    });

    it('fetches a shared detail page once and keeps the first resource', async () => {
      const index = indexPage([
        { service: 'CRM', name: 'Accounts', href: 'details/Accounts' },
        { service: 'CRM', name: 'AccountsCopy', href: 'details/Accounts' },
      ]);
      const { crawler, site } = setup({ [INDEX_URL]: index, ...DETAIL_PAGES });

      const result = await crawler.crawl(OUT);

      expect(site.batches).toEqual([[`${DOCS}details/Accounts`]]);
      expect(result.getStatistics()).toEqual({
        totalResources: 2,
        detailedResources: 1,
        generatedFiles: 1,
        success: true,
      });
      expect(result.detailedResources[0].name).toBe('Accounts');
    });

    it('keeps a resource whose detail page lists no properties', async () => {
      const index = indexPage([{ service: 'CRM', name: 'Accounts', href: 'details/Accounts' }]);
      const { crawler, logger } = setup({
        [INDEX_URL]: index,
        [`${DOCS}details/Accounts`]: detailPage('Accounts', []),
      });

      const result = await crawler.crawl(OUT);

      expect(result.generatedFiles).toEqual([outPath('Crm', 'Accounts.ts')]);
      expect(logger.messages('warn')).toEqual(['No properties found for detailed resource Accounts']);
    });

    it('logs and skips resources that cannot be generated', async () => {
      const index = indexPage([
        { service: 'CRM', name: 'Accounts', href: 'details/Accounts' },
        { service: 'Logistics', name: 'Items', href: 'details/Items' },
      ]);
      const { crawler, logger } = setup({
        [INDEX_URL]: index,
        ...DETAIL_PAGES,
        [`${DOCS}details/Items`]: detailPage('Items', [['Item Code', 'Edm.String', true], ['item_code', 'Edm.String', true]]),
      });

      const result = await crawler.crawl(OUT);

      expect(result.detailedResources.map((r) => r.name)).toEqual(['Accounts', 'Items']);
      expect(result.generatedFiles).toEqual([outPath('Crm', 'Accounts.ts')]);
      expect(logger.messages('error')).toEqual([
        'Failed to generate model for Items: Properties "Item Code" and "item_code" of "Items" both map to field "itemCode"',
      ]);
    });

    it('writes a file once when two resources map to the same model path', async () => {
      const index = indexPage([
        { service: 'Sales', name: 'Sales Invoice' },
        { service: 'Sales', name: 'SalesInvoice' },
      ]);
      const { crawler, writer, logger } = setup({ [INDEX_URL]: index });

      const result = await crawler.crawl(OUT);

      expect(result.getStatistics()).toEqual({
        totalResources: 2,
        detailedResources: 2,
        generatedFiles: 1,
        success: true,
      });
      expect([...writer.files.keys()]).toEqual([outPath('Sales', 'SalesInvoice.ts')]);
      expect(writer.files.get(outPath('Sales', 'SalesInvoice.ts'))).toContain(' * API endpoint for Sales - Sales Invoice\n');
      expect(logger.messages('warn')).toEqual([
        `Skipping SalesInvoice: ${outPath('Sales', 'SalesInvoice.ts')} was already generated for another resource`,
      ]);
    });

    it('logs and skips files that cannot be written', async () => {
      class FailingWriter extends InMemoryModelWriter {
        override async writeFile(filePath: string, content: string): Promise<void> {
          if (filePath.endsWith('Contacts.ts')) {
            throw new Error('disk full');
          }
          await super.writeFile(filePath, content);
        }
      }
      const writer = new FailingWriter();
      const logger = new RecordingLogger();
      const crawler = new ApiCrawler(
        {
          client: new FakeDocsSite(new Map(Object.entries({ [INDEX_URL]: THREE_RESOURCES, ...DETAIL_PAGES }))),
          parser: new DocumentationParser({ docsBaseUrl: DOCS }),
          generator: new ModelGenerator(),
          writer,
          logger,
        },
        { indexUrl: INDEX_URL, batchDelayMs: 0 }
      );

      const result = await crawler.crawl(OUT);

      expect(result.getStatistics().generatedFiles).toBe(2);
      expect(logger.messages('error')).toEqual(['Failed to generate model for Contacts: disk full']);
    });

    it('applies the failure policy to a whole batch when fetching it fails', async () => {
      class UnreachableDetails extends FakeDocsSite {
        override async fetchPages(): Promise<Map<string, string>> {
          throw new Error('network down');
        }
      }
      const logger = new RecordingLogger();
      const writer = new InMemoryModelWriter();
      const crawler = new ApiCrawler(
        {
          client: new UnreachableDetails(new Map([[INDEX_URL, THREE_RESOURCES]])),
          parser: new DocumentationParser({ docsBaseUrl: DOCS }),
          generator: new ModelGenerator(),
          writer,
          logger,
        },
        { indexUrl: INDEX_URL, batchDelayMs: 0 }
      );

      const result = await crawler.crawl(OUT);

      expect(result.success).toBe(true);
      expect(result.getStatistics().generatedFiles).toBe(0);
      expect(logger.messages('error')[0]).toBe('Failed to fetch detail batch: network down');
      expect(logger.messages('error')).toHaveLength(4);
    });

    it('fails the run when the index page cannot be fetched', async () => {
      const events: CrawlProgressEvent[] = [];
      const { crawler, writer, logger } = setup(DETAIL_PAGES, { onProgress: (event) => events.push(event) });

      const result = await crawler.crawl(OUT);

      expect(result.success).toBe(false);
      expect(result.error).toBe('Failed to fetch page: https://docs.example.test/index (Status: 404)');
      expect(result.getStatistics()).toEqual({
        totalResources: 0,
        detailedResources: 0,
        generatedFiles: 0,
        success: false,
      });
      expect(writer.files.size).toBe(0);
      expect(events.map((event) => event.phase)).toEqual(['init', 'fetch_index', 'aborted']);
      expect(logger.messages('error')).toEqual([
        'Crawl failed: Failed to fetch page: https://docs.example.test/index (Status: 404)',
      ]);
    });

    it('succeeds with nothing to do when the index has no resource table', async () => {
      const { crawler, site } = setup({ [INDEX_URL]: '<html><body><p>Maintenance</p></body></html>' });

      const result = await crawler.crawl(OUT);

      expect(result.getStatistics()).toEqual({
        totalResources: 0,
        detailedResources: 0,
        generatedFiles: 0,
        success: true,
      });
      expect(site.batches).toEqual([]);
    });

    it('reports each phase in order', async () => {
      const events: CrawlProgressEvent[] = [];
      const { crawler } = setup(
        { [INDEX_URL]: THREE_RESOURCES, ...DETAIL_PAGES },
        { onProgress: (event) => events.push(event) }
      );

      await crawler.crawl(OUT);

      expect(events.map((event) => event.phase)).toEqual([
        'init',
        'fetch_index',
        'parse_index',
        'fetch_details',
        'parse_details',
        'generate',
        'done',
      ]);
      expect(events[3].details).toEqual({ batch: 1, totalBatches: 1 });
      expect(events[6].details).toEqual({ resources: 3, generatedFiles: 3 });
    });

    it('keeps crawling when a progress callback throws', async () => {
      const { crawler } = setup(
        { [INDEX_URL]: THREE_RESOURCES, ...DETAIL_PAGES },
        {
          onProgress: () => {
            throw new Error('listener broke');
          },
        }
      );

      const result = await crawler.crawl(OUT);

      expect(result.getStatistics().generatedFiles).toBe(3);
    });

    it('emits PHP models through a PHP generator', async () => {
      const writer = new InMemoryModelWriter();
      const crawler = new ApiCrawler(
        {
          client: new FakeDocsSite(new Map(Object.entries({ [INDEX_URL]: THREE_RESOURCES, ...DETAIL_PAGES }))),
          parser: new DocumentationParser({ docsBaseUrl: DOCS }),
          generator: new ModelGenerator(new PhpEmitter()),
          writer,
        },
        { indexUrl: INDEX_URL, batchDelayMs: 0 }
      );

      const result = await crawler.crawl(OUT);

      expect(result.generatedFiles).toEqual([
        outPath('Crm', 'Accounts.php'),
        outPath('Crm', 'Contacts.php'),
        outPath('Financial', 'GLAccounts.php'),
      ]);
    });

    it('works end to end with the HTTP client', async () => {
      const pages: Record<string, string> = { [INDEX_URL]: THREE_RESOURCES, ...DETAIL_PAGES };
      const fetchFn = vi.fn<FetchFn>(async (url) => {
        const body = url.endsWith('GLAccounts') ? undefined : pages[url];
        return body === undefined ? new Response('oops', { status: 500 }) : new Response(body, { status: 200 });
      });
      const writer = new InMemoryModelWriter();
      const crawler = new ApiCrawler(
        {
          client: new DocumentationClient({ fetchFn }),
          parser: new DocumentationParser({ docsBaseUrl: DOCS }),
          generator: new ModelGenerator(),
          writer,
        },
        { indexUrl: INDEX_URL, batchDelayMs: 0 }
      );

      const result = await crawler.crawl(OUT);

      expect(fetchFn).toHaveBeenCalledTimes(4);
      expect(result.generatedFiles).toEqual([outPath('Crm', 'Accounts.ts'), outPath('Crm', 'Contacts.ts')]);
    });

    it('finishes when one detail page never completes its body', async () => {
      const pages: Record<string, string> = { [INDEX_URL]: THREE_RESOURCES, ...DETAIL_PAGES };
      const fetchFn = vi.fn<FetchFn>(async (url) => {
        if (url.endsWith('/Contacts')) {
          const stalled = new ReadableStream<Uint8Array>({
            start(controller) {
              controller.enqueue(new TextEncoder().encode('<html>'));
            },
          });
          return new Response(stalled, { status: 200 });
        }
        return new Response(pages[url], { status: 200 });
      });
      const crawler = new ApiCrawler(
        {
          client: new DocumentationClient({ fetchFn, timeout: 50 }),
          parser: new DocumentationParser({ docsBaseUrl: DOCS }),
          generator: new ModelGenerator(),
          writer: new InMemoryModelWriter(),
        },
        { indexUrl: INDEX_URL, batchDelayMs: 0 }
      );

      const result = await crawler.crawl(OUT);

      expect(result.generatedFiles).toEqual([outPath('Crm', 'Accounts.ts'), outPath('Financial', 'GLAccounts.ts')]);
    });
  });

  it('rejects a non-positive concurrency', () => {
    const { site } = setup({});

    expect(
      () =>
        new ApiCrawler(
          {
            client: site,
            parser: new DocumentationParser(),
            generator: new ModelGenerator(),
            writer: new InMemoryModelWriter(),
          },
          { maxConcurrentRequests: 0 }
        )
    ).toThrow(RangeError);
  });
});

describe('chunk', () => {
  it('splits into consecutive groups', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });

  it('rejects sizes below one', () => {
    expect(() => chunk([1], 0)).toThrow(RangeError);
  });
});

describe('partitionByDetailUrl', () => {
  it('queues resources by detail URL, first one wins', () => {
    const first = createResource({ name: 'A', endpoint: '', detailUrl: 'u1' });
    const duplicate = createResource({ name: 'B', endpoint: '', detailUrl: 'u1' });
    const plain = createResource({ name: 'C', endpoint: '' });

    const { queued, passThrough, duplicates } = partitionByDetailUrl([first, duplicate, plain]);

    expect([...queued.entries()]).toEqual([['u1', first]]);
    expect(passThrough).toEqual([plain]);
    expect(duplicates).toEqual([duplicate]);
  });
});
