/**
 * Error classes for the crawl pipeline
 *
 * - TransportError: a page could not be fetched (fatal only for the index page)
 * - GenerationError: a resource could not be turned into a model
 * - ModelInvariantError: a property or resource was built from contradictory input
 *
 * Parse problems are never errors; the parser returns less data instead.
 */

/**
 * Fetching a documentation page failed (non-2xx status, network error or timeout)
 */
export class TransportError extends Error {
  public readonly url: string;
  public readonly status?: number;

  constructor(message: string, url: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TransportError';
    this.url = url;
    this.status = options?.status;
  }
}

/**
 * The emitter refused a resource (invalid identifiers, clashing fields)
 */
export class GenerationError extends Error {
  public readonly resource: string;

  constructor(message: string, resource: string) {
    super(message);
    this.name = 'GenerationError';
    this.resource = resource;
  }
}

export class ModelInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelInvariantError';
  }
}

/**
 * Extract a printable message from anything a catch block receives
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
