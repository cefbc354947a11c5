import { Inject, Injectable, Logger } from '@nestjs/common';
import searchConfig, { SearchConfig } from '../config/search.config';
import { EmbeddingUnavailableError, NotFoundError, errorMessage } from '../common/errors/search.errors';
import { rethrowIfAborted } from '../common/utils/abort';
import { EMBEDDING_PROVIDER, EmbeddingProvider } from '../embedding/interfaces/embedding.interface';
import { OverlayFilterService } from '../overlay/overlay-filter.service';
import { RELEVANCE_SOURCE, RelevanceSource } from '../relevance/interfaces/relevance.interface';
import { toLogicalDocument } from './document-mapper';
import { FanoutExecutorService } from './fanout-executor.service';
import { LogicalDocument, MergedResult, ScoredHit, SearchHit } from './interfaces/search.interface';
import { paginate } from './paginator';
import { QueryPlannerService } from './query-planner.service';
import { byRelevance, byTextMatch, sumFound } from './result-merger';

/**
 * Cross-collection search: plan, fan out, drop redirected legacy hits,
 * merge into one order and cut the requested page.
 */
@Injectable()
export class FederatedSearchService {
  private readonly logger = new Logger(FederatedSearchService.name);

  constructor(
    private readonly planner: QueryPlannerService,
    private readonly executor: FanoutExecutorService,
    private readonly overlay: OverlayFilterService,
    @Inject(EMBEDDING_PROVIDER) private readonly embeddings: EmbeddingProvider,
    @Inject(RELEVANCE_SOURCE) private readonly relevance: RelevanceSource,
    @Inject(searchConfig.KEY) private readonly config: SearchConfig,
  ) {}

  async searchAcrossCollections(
    collections: string[],
    query: string,
    page: number,
    perPage: number,
    signal?: AbortSignal,
  ): Promise<MergedResult> {
    this.planner.validateCollections(collections);

    const vector = await this.embedQuery(query, signal);
    // Same candidate window for every page, so pages cut from the filtered
    // merge line up with each other; the page itself is cut afterwards.
    const specs = this.planner
      .planTextSearch({ collections, query, vector, alpha: this.config.hybridAlpha })
      .map(spec => ({ ...spec, page: 1, perPage: this.config.browsePageSize }));

    const results = await this.executor.executeBatch(specs, signal);

    const hits: SearchHit[] = results.flatMap(({ collection, result }) =>
      result.hits.map(hit => ({
        document: toLogicalDocument(collection, hit.document),
        textMatchScore: hit.textMatch,
        sourceCollection: collection,
        ...(hit.vectorDistance !== undefined && { vectorDistance: hit.vectorDistance }),
      })),
    );

    const merged = byTextMatch(hits);
    const visible = await this.overlay.excludeRedirected(merged, signal);

    return {
      found: sumFound(results.map(({ result }) => result)),
      page,
      hits: paginate(visible, page, perPage).map(hit => hit.document),
    };
  }

  /**
   * Every document of one category across collections, ordered by title
   * relevance. Collections are browsed to the end, one after the other.
   */
  async searchByCategory(
    collections: string[],
    category: string,
    page: number,
    perPage: number,
    signal?: AbortSignal,
  ): Promise<MergedResult> {
    const specs = this.planner.planMultiCategoryBrowse(collections, category);

    const scored: ScoredHit[] = [];
    let found = 0;

    for (const { collection, ...query } of specs) {
      try {
        await this.executor.walkPages(
          collection,
          query,
          async (result, pageNumber) => {
            if (pageNumber === 1) {
              found += result.found;
            }
            const documents = result.hits.map(hit => ({
              document: toLogicalDocument(collection, hit.document),
            }));
            for (const { document } of await this.overlay.excludeRedirected(documents, signal)) {
              scored.push({ document, relevance: this.scoreOf(document) });
            }
          },
          signal,
        );
      } catch (error) {
        rethrowIfAborted(error, signal);
        this.logBrowseFailure(collection, category, error);
      }
    }

    return {
      found,
      page,
      hits: paginate(byRelevance(scored), page, perPage).map(hit => hit.document),
    };
  }

  /**
   * A single document. A redirected legacy id returns the replacement from
   * the published collection instead; only one hop is followed.
   */
  async getByID(collection: string, id: string, signal?: AbortSignal): Promise<LogicalDocument> {
    const replacement = await this.overlay.resolveRedirect(collection, id, signal);
    if (replacement !== undefined) {
      const published = this.config.collections.published;
      this.logger.log(`Document ${id} in ${collection} was redirected to ${replacement} in ${published}`);
      const fields = await this.executor.getDocument(published, replacement, signal);
      return toLogicalDocument(published, fields);
    }

    const fields = await this.executor.getDocument(collection, id, signal);
    return toLogicalDocument(collection, fields);
  }

  private async embedQuery(query: string, signal?: AbortSignal): Promise<number[] | undefined> {
    const text = query.trim();
    if (text.length === 0 || text === '*') {
      return undefined;
    }
    try {
      return await this.embeddings.embed(text.slice(0, this.config.embedding.maxTextLength), signal);
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) {
        this.logger.warn(`Falling back to text-only search: ${error.message}`);
        return undefined;
      }
      throw error;
    }
  }

  private scoreOf(document: LogicalDocument): number {
    return document.title ? this.relevance.scoreByTitle(document.title) : 0;
  }

  private logBrowseFailure(collection: string, category: string, error: unknown): void {
    if (error instanceof NotFoundError) {
      this.logger.warn(`Collection ${collection} not found while browsing category ${category}`);
    } else {
      this.logger.error(
        `Browsing category ${category} in ${collection} failed: ${errorMessage(error)}`,
      );
    }
  }
}
