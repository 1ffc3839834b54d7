/**
 * Central Timeout Configuration
 *
 * Default timing values for the crawler. Configuration and constructor
 * options override them per run.
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Network fetch timeout
   * Time allowed for a single documentation page request
   */
  NETWORK_FETCH: 30000,

  /** Pause between detail-page batches */
  BATCH_DELAY: 1000,
} as const;

/**
 * Type for timeout keys
 */
export type TimeoutKey = keyof typeof TIMEOUTS;

/**
 * Get a timeout value with optional override
 */
export function getTimeout(key: TimeoutKey, override?: number): number {
  return override ?? TIMEOUTS[key];
}

/**
 * Resolve after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
