/**
 * Base Search Provider
 *
 * Shared search lifecycle: blank-query rejection, supersession of an
 * in-flight search, the searching flag and request statistics. Concrete
 * providers implement only the lookup itself.
 *
 * @module providers/base
 */

import type { Logger } from '../logging/index.js';
import type { PlaceRecord } from '../places/record.js';
import type { ProviderType } from '../schemas/common.js';
import type { ProviderInfo, ProviderStats, SearchProvider } from './types.js';
import {
  SearchProviderError,
  cancelledError,
  describeError,
  isCancellation,
} from './errors.js';

export interface BaseProviderOptions {
  logger?: Logger;
}

/**
 * Abstract provider handling everything except the lookup.
 *
 * Subclasses implement `performSearch` and `abortSearch`. A search whose
 * generation is no longer current when it settles is reported as
 * cancelled, so a superseded request never delivers results.
 */
export abstract class BaseSearchProvider implements SearchProvider {
  abstract readonly type: ProviderType;
  abstract readonly info: ProviderInfo;

  protected readonly logger?: Logger;

  private searching = false;
  private generation = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private lastError: string | null = null;

  constructor(options: BaseProviderOptions = {}) {
    this.logger = options.logger;
  }

  async search(query: string): Promise<PlaceRecord[]> {
    this.logger?.info(`[${this.info.name}] Search query: ${query}`);

    if (query.trim() === '') {
      const error = new SearchProviderError('Please enter a search query', 'EMPTY_QUERY');
      this.logger?.error(`[${this.info.name}] ${error.message}`);
      this.recordFailure(error.message);
      throw error;
    }

    if (this.searching) {
      this.logger?.warn(
        `[${this.info.name}] Search already in progress, cancelling previous search`
      );
      this.cancel();
    }

    const generation = ++this.generation;
    this.searching = true;

    try {
      const records = await this.performSearch(query);
      if (generation !== this.generation) {
        throw cancelledError();
      }
      this.recordSuccess();
      this.logger?.info(`[${this.info.name}] Found ${records.length} cities`);
      return records;
    } catch (error) {
      if (generation !== this.generation || isCancellation(error)) {
        throw isCancellation(error) ? error : cancelledError();
      }
      this.recordFailure(describeError(error));
      this.logger?.error(`[${this.info.name}] ${describeError(error)}`);
      throw error;
    } finally {
      if (generation === this.generation) {
        this.searching = false;
      }
    }
  }

  cancel(): void {
    if (!this.searching) {
      this.logger?.debug(`[${this.info.name}] Cancel requested but no search in progress`);
      return;
    }

    this.logger?.info(`[${this.info.name}] Cancelling search`);
    this.generation++;
    this.searching = false;
    this.abortSearch();
  }

  isSearching(): boolean {
    return this.searching;
  }

  getStats(): ProviderStats {
    return {
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      lastError: this.lastError,
    };
  }

  /**
   * Look up places for a non-blank query. Must resolve non-empty or reject.
   */
  protected abstract performSearch(query: string): Promise<PlaceRecord[]>;

  /**
   * Stop the lookup currently in progress.
   */
  protected abstract abortSearch(): void;

  private recordSuccess(): void {
    this.successfulRequests++;
    this.lastError = null;
  }

  private recordFailure(message: string): void {
    this.failedRequests++;
    this.lastError = message;
  }
}
