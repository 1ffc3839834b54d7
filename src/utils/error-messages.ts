/**
 * Error Messages with Actionable Suggestions
 *
 * User-facing messages printed by the CLI when a run fails or degrades.
 */

/**
 * Error message builder for consistent formatting
 */
export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Alternative approaches */
  alternatives?: string[];
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach(s => parts.push(`  - ${s}`));
    }
  }

  if (options.alternatives && options.alternatives.length > 0) {
    if (options.alternatives.length === 1) {
      parts.push(`Alternative: ${options.alternatives[0]}`);
    } else {
      parts.push('Alternatives:');
      options.alternatives.forEach(a => parts.push(`  - ${a}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// CRAWL ERRORS
// =============================================================================

/**
 * The index page could not be fetched, so nothing was generated
 */
export function indexFetchFailedError(indexUrl: string, reason: string): string {
  return buildErrorMessage({
    message: `Failed to fetch the documentation index at ${indexUrl}: ${reason}`,
    suggestions: [
      'Check that the documentation site is reachable from this machine',
      'Override the index location with --index-url or CODEGEN_INDEX_URL',
      'Raise CODEGEN_REQUEST_TIMEOUT_MS if the site is slow to respond',
    ],
  });
}

/**
 * The index page was fetched but no resource table was recognized
 */
export function noResourcesFoundError(indexUrl: string): string {
  return buildErrorMessage({
    message: `No resource table was recognized on ${indexUrl}.`,
    suggestions: [
      'The table needs Service, Endpoint, Resource URI, Supported methods, Webhook and Scope headers',
      'Run with --verbose to see which tables were inspected',
    ],
  });
}

/**
 * Some discovered resources did not produce a file
 */
export function partialGenerationWarning(total: number, generated: number): string {
  return buildErrorMessage({
    message: `Generated ${generated} of ${total} discovered resources.`,
    suggestions: [
      'Resources whose detail page failed are left out; see the log for each failure',
    ],
    alternatives: [
      'Use --keep-minimal to generate index-only models for failed detail pages',
    ],
  });
}
