/**
 * Summary of one crawl run
 */

import type { ApiResource } from './api-resource.js';

export interface CrawlStatistics {
  totalResources: number;
  detailedResources: number;
  generatedFiles: number;
  success: boolean;
}

export class CrawlResult {
  readonly resources: readonly ApiResource[];
  readonly detailedResources: readonly ApiResource[];
  readonly generatedFiles: readonly string[];
  readonly success: boolean;
  readonly error?: string;

  private constructor(init: {
    resources: readonly ApiResource[];
    detailedResources: readonly ApiResource[];
    generatedFiles: readonly string[];
    success: boolean;
    error?: string;
  }) {
    this.resources = Object.freeze([...init.resources]);
    this.detailedResources = Object.freeze([...init.detailedResources]);
    this.generatedFiles = Object.freeze([...init.generatedFiles]);
    this.success = init.success;
    if (init.error !== undefined) {
      this.error = init.error;
    }
    Object.freeze(this);
  }

  static succeeded(
    resources: readonly ApiResource[],
    detailedResources: readonly ApiResource[],
    generatedFiles: readonly string[]
  ): CrawlResult {
    return new CrawlResult({ resources, detailedResources, generatedFiles, success: true });
  }

  static failed(error: string): CrawlResult {
    return new CrawlResult({
      resources: [],
      detailedResources: [],
      generatedFiles: [],
      success: false,
      error,
    });
  }

  /**
   * Counts for reporting. `generatedFiles < totalResources` means some resources were skipped.
   */
  getStatistics(): CrawlStatistics {
    return {
      totalResources: this.resources.length,
      detailedResources: this.detailedResources.length,
      generatedFiles: this.generatedFiles.length,
      success: this.success,
    };
  }
}
