/**
 * Documentation Client
 *
 * Fetches documentation pages over HTTP. Each request carries its own
 * timeout; `fetchPages` issues a whole batch at once and waits for every
 * request to settle.
 */

import { TransportError, errorMessage } from '../utils/errors.js';
import { noopLogger, type CrawlLogger } from '../utils/logger.js';
import { getTimeout } from '../utils/timeouts.js';

/**
 * What the crawler needs from an HTTP client
 */
export interface PageFetcher {
  /**
   * @throws TransportError on non-success status, network failure or timeout
   */
  fetchPage(url: string): Promise<string>;
  /**
   * Bodies of the URLs that succeeded, keyed by URL. Failures are left out.
   */
  fetchPages(urls: readonly string[]): Promise<Map<string, string>>;
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface DocumentationClientOptions {
  /** Custom fetch function for testing */
  fetchFn?: FetchFn;
  /** Timeout per request in ms (default: 30000) */
  timeout?: number;
  userAgent?: string;
  logger?: CrawlLogger;
}

const DEFAULT_USER_AGENT = 'apidoc-codegen/1.0.0';

export class DocumentationClient implements PageFetcher {
  private readonly fetchFn: FetchFn;
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly logger: CrawlLogger;

  constructor(options: DocumentationClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeout = getTimeout('NETWORK_FETCH', options.timeout);
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger ?? noopLogger;
  }

  async fetchPage(url: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    // The timer stays armed until the body has been read
    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method: 'GET',
          headers: {
            'User-Agent': this.userAgent,
            Accept: 'text/html,application/xhtml+xml',
          },
          signal: controller.signal,
        });
      } catch (error) {
        throw this.failure(url, controller, error);
      }

      if (!response.ok) {
        await this.discardBody(url, response);
        throw new TransportError(
          `Failed to fetch page: ${url} (Status: ${response.status})`,
          url,
          { status: response.status }
        );
      }

      return await this.readBody(url, response, controller);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Read the body, giving up when the request is aborted
   */
  private async readBody(url: string, response: Response, controller: AbortController): Promise<string> {
    const { signal } = controller;
    let onAbort: () => void = () => {};
    const aborted = new Promise<never>((_resolve, reject) => {
      onAbort = () => reject(new Error('aborted'));
      signal.addEventListener('abort', onAbort, { once: true });
      if (signal.aborted) onAbort();
    });

    try {
      return await Promise.race([response.text(), aborted]);
    } catch (error) {
      if (signal.aborted) {
        await this.discardBody(url, response);
      }
      throw this.failure(url, controller, error);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Release the connection behind a body nobody will read
   */
  private async discardBody(url: string, response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      // A body already being read is locked and cannot be cancelled from here
      this.logger.debug('Could not cancel body of {url}: {reason}', { url, reason: errorMessage(error) });
    }
  }

  private failure(url: string, controller: AbortController, error: unknown): TransportError {
    const reason = controller.signal.aborted ? `timed out after ${this.timeout}ms` : errorMessage(error);
    return new TransportError(`Failed to fetch page: ${url} (${reason})`, url, { cause: error });
  }

  async fetchPages(urls: readonly string[]): Promise<Map<string, string>> {
    const settled = await Promise.allSettled(urls.map((url) => this.fetchPage(url)));
    const pages = new Map<string, string>();

    settled.forEach((result, index) => {
      const url = urls[index];
      if (result.status === 'fulfilled') {
        pages.set(url, result.value);
      } else {
        this.logger.debug('Request for {url} failed: {reason}', {
          url,
          reason: errorMessage(result.reason),
        });
      }
    });

    return pages;
  }
}
