/**
 * Progress Event Types for ApiCrawler.crawl()
 *
 * A crawl moves through fixed phases:
 *
 *   init → fetch_index → parse_index → fetch_details → parse_details → generate → done
 *
 * `aborted` is only reachable from `fetch_index`. `fetch_details` and
 * `parse_details` repeat once per batch. Streaming runs write files while
 * parsing and emit no `generate` event.
 */

/**
 * Phases of a crawl run
 */
export type CrawlPhase =
  | 'init'
  | 'fetch_index'
  | 'parse_index'
  | 'fetch_details'   // One event per batch
  | 'parse_details'
  | 'generate'
  | 'done'
  | 'aborted';

/**
 * Progress event emitted during a crawl
 */
export interface CrawlProgressEvent {
  phase: CrawlPhase;

  /** Human-readable description of current activity */
  message: string;

  /** Elapsed time in milliseconds since the crawl started */
  elapsedMs: number;

  details?: {
    /** 1-based batch number during fetch_details */
    batch?: number;
    totalBatches?: number;
    /** Resources discovered on the index */
    resources?: number;
    /** Files generated so far */
    generatedFiles?: number;
    error?: string;
  };
}

/**
 * Callback function for receiving progress events
 */
export type OnCrawlProgress = (event: CrawlProgressEvent) => void;

/**
 * Helper to create progress events with consistent structure
 */
export function createProgressEvent(
  phase: CrawlPhase,
  message: string,
  startTime: number,
  details?: CrawlProgressEvent['details']
): CrawlProgressEvent {
  return {
    phase,
    message,
    elapsedMs: Date.now() - startTime,
    ...(details ? { details } : {}),
  };
}
