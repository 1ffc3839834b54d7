/**
 * Documentation Parser
 *
 * Reads the two table shapes published by the REST API documentation:
 *
 * - the index page, one table listing every resource
 *   (Service | Endpoint | Resource URI | Supported methods | Webhook | Scope)
 * - the per-resource detail page, one table listing every property
 *   (checkbox | Name | Mandatory | Value POST | Value PUT | Type | Description)
 *
 * The markup differs between pages (headers as `th`, as `tr.header` cells, or
 * just the first row; data rows with or without `tr.filter`), so header and
 * row discovery run ordered strategy lists and take the first match.
 *
 * Nothing in here throws on malformed HTML. Missing pieces come back as empty
 * strings, empty arrays or documented defaults.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { normalizeType } from './type-normalizer.js';
import {
  createProperty,
  createResource,
  withOverrides,
  type ApiProperty,
  type ApiResource,
} from '../types/api-resource.js';
import { noopLogger, type CrawlLogger } from '../utils/logger.js';

// ============================================
// TYPES
// ============================================

/**
 * One way of locating cells or rows inside a table.
 * Returns `null` when the table does not have the shape this strategy looks for.
 */
export interface TableStrategy {
  readonly name: string;
  find(table: Cheerio<Element>): Cheerio<Element> | null;
}

export interface DocumentationParserOptions {
  /** Base for relative detail-page links (default: https://start.exactonline.nl/docs/) */
  docsBaseUrl?: string;
  /** Suffix stripped from `<title>` when a page has no `<h1>` */
  titleSuffix?: string;
  /** Path prefix an endpoint code block must contain */
  apiPathPrefix?: string;
  /** Placeholder an endpoint code block must contain */
  divisionPlaceholder?: string;
  logger?: CrawlLogger;
}

// ============================================
// CONSTANTS
// ============================================

/**
 * Substrings the index table's header text must all contain
 */
export const INDEX_TABLE_HEADERS = [
  'service',
  'endpoint',
  'resource uri',
  'supported methods',
  'webhook',
  'scope',
] as const;

const MIN_INDEX_CELLS = 6;
const MIN_PROPERTY_CELLS = 7;
const MIN_DETAIL_HEADER_CELLS = 3;

/**
 * Column positions in a detail-page property row
 */
const PROPERTY_COLUMNS = {
  name: 1,
  mandatory: 2,
  type: 5,
  description: 6,
} as const;

const NO_WEBHOOK_MARKER = 'HasNoWebhook';
const KEY_MARKER_SELECTOR = 'img[title="Key"]';

export const UNKNOWN_RESOURCE_NAME = 'UnknownResource';

const DEFAULT_OPTIONS = {
  docsBaseUrl: 'https://start.exactonline.nl/docs/',
  titleSuffix: ' - Exact Online REST API',
  apiPathPrefix: '/api/v1/',
  divisionPlaceholder: '{division}',
};

// ============================================
// DISCOVERY STRATEGIES
// ============================================

function nonEmpty(selection: Cheerio<Element>): Cheerio<Element> | null {
  return selection.length > 0 ? selection : null;
}

/**
 * Header cell discovery, tried in order
 */
export const HEADER_STRATEGIES: readonly TableStrategy[] = [
  {
    name: 'heading-cells',
    find: (table) => nonEmpty(table.find('th')),
  },
  {
    name: 'header-class-row',
    find: (table) => {
      const row = table.find('tr.header').first();
      return row.length > 0 ? nonEmpty(row.find('td')) : null;
    },
  },
  {
    name: 'first-row',
    find: (table) => {
      const row = table.find('tr').first();
      return row.length > 0 ? nonEmpty(row.find('td')) : null;
    },
  },
];

/**
 * Data row discovery, tried in order
 */
export const ROW_STRATEGIES: readonly TableStrategy[] = [
  {
    name: 'filter-rows',
    find: (table) => nonEmpty(table.find('tr.filter')),
  },
  {
    name: 'body-rows',
    find: (table) => nonEmpty(table.find('tbody tr')),
  },
  {
    name: 'non-header-rows',
    find: (table) => nonEmpty(table.find('tr:not(.header)')),
  },
];

/**
 * Run strategies in order and return the first match
 */
export function firstMatch(
  strategies: readonly TableStrategy[],
  table: Cheerio<Element>
): { strategy: string; selection: Cheerio<Element> } | null {
  for (const strategy of strategies) {
    const selection = strategy.find(table);
    if (selection) {
      return { strategy: strategy.name, selection };
    }
  }
  return null;
}

// ============================================
// TEXT HELPERS
// ============================================

function cellText($: CheerioAPI, cell: Element): string {
  return $(cell).text().trim();
}

function headerText($: CheerioAPI, cells: Cheerio<Element>): string {
  return cells
    .toArray()
    .map((cell) => cellText($, cell))
    .join(' ')
    .replace(/\s+/g, ' ')
    .toLowerCase();
}

function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle);
}

/**
 * Whether lower-cased header text identifies the resource index table
 */
export function isIndexTableHeader(text: string): boolean {
  const lower = text.toLowerCase();
  return INDEX_TABLE_HEADERS.every((expected) => lower.includes(expected));
}

/**
 * Whether lower-cased header text identifies a property table
 */
export function isPropertyTableHeader(text: string): boolean {
  const lower = text.toLowerCase();
  return lower.includes('name') && lower.includes('type') &&
    (lower.includes('mandatory') || lower.includes('description'));
}

// ============================================
// PARSER
// ============================================

export class DocumentationParser {
  private readonly docsBaseUrl: string;
  private readonly titleSuffix: string;
  private readonly apiPathPrefix: string;
  private readonly divisionPlaceholder: string;
  private readonly logger: CrawlLogger;

  constructor(options: DocumentationParserOptions = {}) {
    const baseUrl = options.docsBaseUrl ?? DEFAULT_OPTIONS.docsBaseUrl;
    this.docsBaseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.titleSuffix = options.titleSuffix ?? DEFAULT_OPTIONS.titleSuffix;
    this.apiPathPrefix = options.apiPathPrefix ?? DEFAULT_OPTIONS.apiPathPrefix;
    this.divisionPlaceholder = options.divisionPlaceholder ?? DEFAULT_OPTIONS.divisionPlaceholder;
    this.logger = options.logger ?? noopLogger;
  }

  // ------------------------------------------
  // Index page
  // ------------------------------------------

  /**
   * Parse the index page into resources without properties.
   * Returns an empty array when no table looks like the resource index.
   */
  parseMainPage(html: string): ApiResource[] {
    const $ = cheerio.load(html);
    const tables = $('table').toArray();

    for (const [index, table] of tables.entries()) {
      const resources = this.parseApiTable($, $(table), index);
      if (resources.length > 0) {
        return resources;
      }
    }

    this.logger.debug('No resource index table among {count} tables', { count: tables.length });
    return [];
  }

  private parseApiTable($: CheerioAPI, table: Cheerio<Element>, tableIndex: number): ApiResource[] {
    const headers = firstMatch(HEADER_STRATEGIES, table);
    if (!headers || headers.selection.length < MIN_INDEX_CELLS) {
      return [];
    }

    if (!isIndexTableHeader(headerText($, headers.selection))) {
      return [];
    }

    const rows = firstMatch(ROW_STRATEGIES, table);
    if (!rows) {
      return [];
    }

    this.logger.debug('Index table {table} matched (headers: {headerStrategy}, rows: {rowStrategy})', {
      table: tableIndex,
      headerStrategy: headers.strategy,
      rowStrategy: rows.strategy,
    });

    const resources: ApiResource[] = [];
    for (const row of rows.selection.toArray()) {
      const cells = $(row).find('td');
      if (cells.length < MIN_INDEX_CELLS) {
        continue;
      }
      const resource = this.parseApiTableRow($, cells);
      if (resource) {
        resources.push(resource);
      }
    }

    return resources;
  }

  private parseApiTableRow($: CheerioAPI, cells: Cheerio<Element>): ApiResource | null {
    const service = cells.eq(0).text().trim();

    // Endpoint name is usually the text of a link to the detail page
    const endpointCell = cells.eq(1);
    const link = endpointCell.find('a').first();
    const name = link.length > 0 ? link.text().trim() : endpointCell.text().trim();
    const detailUrl = link.length > 0 ? this.resolveDetailUrl(link.attr('href')) : undefined;

    const resourceUri = cells.eq(2).text().trim();
    const supportedMethods = cells.eq(3).text().trim();
    const hasWebhook = this.parseWebhookFlag(cells.eq(4).attr('class'));
    const scope = cells.eq(5).text().trim();

    if (!service || !name || !resourceUri) {
      return null;
    }

    // A second header row inside the body
    if (
      containsIgnoreCase(service, 'service') ||
      containsIgnoreCase(name, 'endpoint') ||
      containsIgnoreCase(resourceUri, 'resource uri')
    ) {
      return null;
    }

    return createResource({
      name,
      endpoint: resourceUri,
      description: `API endpoint for ${service} - ${name}`,
      properties: [],
      service,
      resourceUri,
      supportedMethods,
      hasWebhook,
      scope,
      detailUrl,
    });
  }

  /**
   * Resolve a link from the index table. Relative links are joined onto the docs base.
   */
  resolveDetailUrl(href: string | undefined): string | undefined {
    const value = href?.trim();
    if (!value) {
      return undefined;
    }
    if (value.startsWith('http')) {
      return value;
    }
    return this.docsBaseUrl + value.replace(/^\/+/, '');
  }

  private parseWebhookFlag(classAttribute: string | undefined): boolean {
    const classes = classAttribute?.trim();
    if (!classes) {
      return false;
    }
    return !classes.includes(NO_WEBHOOK_MARKER);
  }

  // ------------------------------------------
  // Detail pages
  // ------------------------------------------

  /**
   * Parse a detail page on its own (name, endpoint, description and properties)
   */
  parseResourcePage(html: string): ApiResource {
    const $ = cheerio.load(html);

    return createResource({
      name: this.extractResourceName($),
      endpoint: this.extractEndpoint($),
      description: this.extractDescription($),
      properties: this.extractProperties($),
    });
  }

  /**
   * Combine a detail page with the resource found on the index.
   *
   * Properties and description come from the detail page; the index values are
   * kept where the page yields nothing. Routing metadata is carried over.
   */
  parseDetailPageProperties(html: string, resource: ApiResource): ApiResource {
    const $ = cheerio.load(html);
    const properties = this.extractProperties($);
    const description = this.extractDescription($);

    return withOverrides(resource, {
      description: description || resource.description,
      properties: properties.length > 0 ? properties : resource.properties,
    });
  }

  private extractResourceName($: CheerioAPI): string {
    const heading = $('h1').first().text().trim();
    if (heading) {
      return heading;
    }

    const title = $('title').first().text().trim();
    if (title) {
      const stripped = this.titleSuffix ? title.split(this.titleSuffix).join('').trim() : title;
      if (stripped) {
        return stripped;
      }
    }

    return UNKNOWN_RESOURCE_NAME;
  }

  private extractEndpoint($: CheerioAPI): string {
    for (const block of $('code, pre').toArray()) {
      const content = cellText($, block);
      if (content.includes(this.apiPathPrefix) && content.includes(this.divisionPlaceholder)) {
        return content;
      }
    }
    return '';
  }

  private extractDescription($: CheerioAPI): string {
    const heading = $('h1').first();
    if (heading.length === 0) {
      return '';
    }
    return heading.nextAll('p').first().text().trim();
  }

  /**
   * Properties from the first table that looks like a property table and yields rows
   */
  private extractProperties($: CheerioAPI): ApiProperty[] {
    for (const table of $('table').toArray()) {
      const properties = this.extractPropertiesFromTable($, $(table));
      if (properties.length > 0) {
        return properties;
      }
    }
    return [];
  }

  private extractPropertiesFromTable($: CheerioAPI, table: Cheerio<Element>): ApiProperty[] {
    const rows = table.find('tr');
    if (rows.length < 2) {
      return [];
    }

    const headerCells = rows.first().find('td, th');
    if (headerCells.length < MIN_DETAIL_HEADER_CELLS) {
      return [];
    }

    if (!isPropertyTableHeader(headerText($, headerCells))) {
      return [];
    }

    const properties: ApiProperty[] = [];
    for (const row of rows.toArray().slice(1)) {
      const property = this.parsePropertyRow($, $(row).find('td'));
      if (property) {
        properties.push(property);
      }
    }
    return properties;
  }

  private parsePropertyRow($: CheerioAPI, cells: Cheerio<Element>): ApiProperty | null {
    if (cells.length < MIN_PROPERTY_CELLS) {
      return null;
    }

    const values = cells.toArray().map((cell) => cellText($, cell));
    const name = values[PROPERTY_COLUMNS.name];

    // Malformed separator rows
    if (!name || name.includes('|')) {
      return null;
    }

    const isMandatory = values[PROPERTY_COLUMNS.mandatory].toLowerCase() === 'true';
    const isKey = cells.eq(PROPERTY_COLUMNS.name).find(KEY_MARKER_SELECTOR).length > 0;
    const isRequired = isMandatory || isKey;

    return createProperty({
      name,
      type: normalizeType(values[PROPERTY_COLUMNS.type]),
      description: values[PROPERTY_COLUMNS.description],
      isRequired,
      isNullable: !isRequired,
    });
  }
}
