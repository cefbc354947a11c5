import { Inject, Injectable, Logger } from '@nestjs/common';
import searchConfig, { SearchConfig } from '../config/search.config';
import { NotFoundError } from '../common/errors/search.errors';
import { throwIfAborted } from '../common/utils/abort';
import { DocumentFields } from './interfaces/search.interface';
import {
  CollectionQuerySpec,
  DOCUMENT_STORE,
  DocumentStore,
  SearchQuery,
  StoreSearchResult,
} from '../storage/interfaces/document-store.interface';

export interface CollectionResult {
  collection: string;
  result: StoreSearchResult;
}

export type PageVisitor = (result: StoreSearchResult, page: number) => void | Promise<void>;

const emptyResult = (): StoreSearchResult => ({ hits: [], found: 0, facets: {} });

/**
 * Runs planned specs against the document store.
 */
@Injectable()
export class FanoutExecutorService {
  private readonly logger = new Logger(FanoutExecutorService.name);

  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(searchConfig.KEY) private readonly config: SearchConfig,
  ) {}

  /**
   * One round trip for every spec. The result list lines up with `specs`;
   * a collection whose slot failed contributes an empty result.
   */
  async executeBatch(specs: CollectionQuerySpec[], signal?: AbortSignal): Promise<CollectionResult[]> {
    if (specs.length === 0) {
      return [];
    }

    const slots = await this.store.multiSearch(specs, signal);

    return specs.map(({ collection }, i) => {
      const slot = slots[i];
      if (slot.ok) {
        return { collection, result: slot.result };
      }
      if (slot.error instanceof NotFoundError) {
        this.logger.warn(`Collection ${collection} not found, skipping`);
      } else {
        this.logger.error(`Search failed for collection ${collection}: ${slot.error.message}`);
      }
      return { collection, result: emptyResult() };
    });
  }

  executeSingle(collection: string, query: SearchQuery, signal?: AbortSignal): Promise<StoreSearchResult> {
    return this.store.search(collection, query, signal);
  }

  getDocument(collection: string, id: string, signal?: AbortSignal): Promise<DocumentFields> {
    return this.store.getDocument(collection, id, signal);
  }

  /**
   * Fetches every page of a query in sequence and hands each page to
   * `visit`. Stops at the first page shorter than the page size; errors from
   * the store or the visitor end the walk. Returns the number of requests
   * made.
   */
  async walkPages(
    collection: string,
    query: SearchQuery,
    visit: PageVisitor,
    signal?: AbortSignal,
  ): Promise<number> {
    const ceiling = this.config.browsePageSize;
    const pageSize = Math.max(1, Math.min(query.perPage ?? ceiling, ceiling));

    let fetches = 0;
    for (let page = 1; ; page++) {
      throwIfAborted(signal);
      const result = await this.store.search(collection, { ...query, page, perPage: pageSize }, signal);
      fetches++;
      await visit(result, page);
      if (result.hits.length < pageSize) {
        return fetches;
      }
    }
  }
}
