import { Inject, Injectable, Logger } from '@nestjs/common';
import { CANONICAL_CATEGORIES, CATEGORY_FIELD } from '../constants/categories';
import { NotFoundError, errorMessage } from '../common/errors/search.errors';
import { rethrowIfAborted, throwIfAborted } from '../common/utils/abort';
import { normalizeCategory } from '../common/utils/normalize';
import { OverlayFilterService } from '../overlay/overlay-filter.service';
import { RELEVANCE_SOURCE, RelevanceSource } from '../relevance/interfaces/relevance.interface';
import { toLogicalDocument } from '../search/document-mapper';
import { FanoutExecutorService } from '../search/fanout-executor.service';
import {
  CategoryRelevance,
  CategoryRelevanceReport,
} from '../search/interfaces/search.interface';
import { QueryPlannerService } from '../search/query-planner.service';

interface CategoryTotals {
  totalRelevance: number;
  documentCount: number;
}

/**
 * Aggregates title relevance per category across collections. Categories
 * are discovered through facets, then every document in each one is paged
 * through and scored.
 */
@Injectable()
export class CategoryRelevanceService {
  private readonly logger = new Logger(CategoryRelevanceService.name);

  constructor(
    private readonly planner: QueryPlannerService,
    private readonly executor: FanoutExecutorService,
    private readonly overlay: OverlayFilterService,
    @Inject(RELEVANCE_SOURCE) private readonly relevance: RelevanceSource,
  ) {}

  async categoryRelevance(collections: string[], signal?: AbortSignal): Promise<CategoryRelevanceReport> {
    this.planner.validateCollections(collections);
    const totals = new Map<string, CategoryTotals>(
      CANONICAL_CATEGORIES.map(name => [name, { totalRelevance: 0, documentCount: 0 }]),
    );

    for (const collection of collections) {
      const categories = await this.discoverCategories(collection, { publishedOnly: true }, signal);
      for (const category of categories.keys()) {
        try {
          const scored = await this.scoreCategory(collection, category, signal);
          const current = totals.get(category) ?? { totalRelevance: 0, documentCount: 0 };
          totals.set(category, {
            totalRelevance: current.totalRelevance + scored.totalRelevance,
            documentCount: current.documentCount + scored.documentCount,
          });
        } catch (error) {
          rethrowIfAborted(error, signal);
          this.logger.error(
            `Scoring category ${category} in ${collection} failed: ${errorMessage(error)}`,
          );
        }
      }
    }

    const categories: CategoryRelevance[] = [...totals].map(([name, { totalRelevance, documentCount }]) => ({
      name,
      normalizedName: normalizeCategory(name),
      totalRelevance,
      documentCount,
      averageRelevance: documentCount > 0 ? totalRelevance / documentCount : 0,
    }));
    categories.sort((a, b) => b.totalRelevance - a.totalRelevance || a.name.localeCompare(b.name));

    return {
      categories,
      totalCategories: categories.length,
      lastUpdated: new Date().toISOString(),
    };
  }

  /**
   * Document count per category value as stored, drafts included, summed
   * across collections.
   */
  async diagnoseCategories(collections: string[], signal?: AbortSignal): Promise<Record<string, number>> {
    this.planner.validateCollections(collections);
    const found: Record<string, number> = {};
    for (const collection of collections) {
      const counts = await this.discoverCategories(collection, { publishedOnly: false }, signal);
      for (const [category, count] of counts) {
        found[category] = (found[category] ?? 0) + count;
      }
    }
    return found;
  }

  /**
   * Non-empty category values with their facet counts. A collection that
   * cannot be read yields none.
   */
  private async discoverCategories(
    collection: string,
    options: { publishedOnly: boolean },
    signal?: AbortSignal,
  ): Promise<Map<string, number>> {
    throwIfAborted(signal);
    const { collection: target, ...query } = this.planner.planFacetDiscovery(collection, options);

    const counts = new Map<string, number>();
    try {
      const result = await this.executor.executeSingle(target, query, signal);
      for (const { value, count } of result.facets[CATEGORY_FIELD] ?? []) {
        if (value !== '') {
          counts.set(value, (counts.get(value) ?? 0) + count);
        }
      }
    } catch (error) {
      rethrowIfAborted(error, signal);
      if (error instanceof NotFoundError) {
        this.logger.warn(`Collection ${collection} not found, skipping`);
      } else {
        this.logger.error(`Category discovery in ${collection} failed: ${errorMessage(error)}`);
      }
    }
    return counts;
  }

  /**
   * Totals for one category in one collection. Only documents carrying a
   * title count; redirected legacy documents are left out.
   */
  private async scoreCategory(
    collection: string,
    category: string,
    signal?: AbortSignal,
  ): Promise<CategoryTotals> {
    const { collection: target, ...query } = this.planner.planCategoryScoring(collection, category);
    const totals: CategoryTotals = { totalRelevance: 0, documentCount: 0 };

    await this.executor.walkPages(
      target,
      query,
      async ({ hits }) => {
        const documents = hits.map(hit => ({ document: toLogicalDocument(collection, hit.document) }));
        for (const { document } of await this.overlay.excludeRedirected(documents, signal)) {
          if (document.title !== undefined) {
            totals.totalRelevance += this.relevance.scoreByTitle(document.title);
            totals.documentCount++;
          }
        }
      },
      signal,
    );

    return totals;
  }
}
