import { Inject, Injectable, Logger } from '@nestjs/common';
import searchConfig, { SearchConfig } from '../config/search.config';
import { errorMessage } from '../common/errors/search.errors';
import { rethrowIfAborted, throwIfAborted } from '../common/utils/abort';
import { LogicalDocument } from '../search/interfaces/search.interface';
import { REDIRECTION_INDEX, RedirectionIndex } from './interfaces/redirection.interface';

/**
 * Hides or redirects documents from legacy collections that have been
 * decommissioned. Only legacy collections are ever looked up, and a failing
 * lookup keeps the document visible.
 */
@Injectable()
export class OverlayFilterService {
  private readonly logger = new Logger(OverlayFilterService.name);
  private readonly legacy: ReadonlySet<string>;

  constructor(
    @Inject(REDIRECTION_INDEX) private readonly index: RedirectionIndex,
    @Inject(searchConfig.KEY) config: SearchConfig,
  ) {
    this.legacy = new Set(config.collections.legacy);
  }

  isLegacy(collection: string): boolean {
    return this.legacy.has(collection);
  }

  /**
   * Drops every hit whose document has been redirected. Order is preserved.
   * Lookups run one at a time and stop as soon as the signal fires.
   */
  async excludeRedirected<T extends { document: LogicalDocument }>(
    hits: T[],
    signal?: AbortSignal,
  ): Promise<T[]> {
    const visible: T[] = [];
    for (const hit of hits) {
      throwIfAborted(signal);
      if (!(await this.isRedirected(hit.document.collection, hit.document.id, signal))) {
        visible.push(hit);
      }
    }
    return visible;
  }

  async isRedirected(collection: string, id: string, signal?: AbortSignal): Promise<boolean> {
    const replacement = await this.resolveRedirect(collection, id, signal);
    if (replacement === undefined) {
      return false;
    }
    this.logger.log(`Skipping redirected document ${id} from ${collection} (now ${replacement})`);
    return true;
  }

  /**
   * Returns the replacement id when a legacy document has been redirected.
   */
  async resolveRedirect(
    collection: string,
    id: string,
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    if (!this.isLegacy(collection)) {
      return undefined;
    }
    try {
      return await this.index.lookup(collection, id, signal);
    } catch (error) {
      rethrowIfAborted(error, signal);
      this.logger.warn(
        `Redirection lookup failed for ${id} in ${collection}, keeping it: ${errorMessage(error)}`,
      );
      return undefined;
    }
  }
}
