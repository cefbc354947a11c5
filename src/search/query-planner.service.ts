import { Inject, Injectable } from '@nestjs/common';
import searchConfig, { SearchConfig } from '../config/search.config';
import { CATEGORY_FIELD } from '../constants/categories';
import { InvalidRequestError } from '../common/errors/search.errors';
import { CollectionQuerySpec } from '../storage/interfaces/document-store.interface';
import { TextSearchRequest } from './interfaces/search.interface';

export const QUERY_BY_FIELDS = ['search_content', 'titulo', 'descricao'];
export const EMBEDDING_FIELD = 'embedding';
export const PUBLISHED_STATUS_FILTER = 'status:=1';
// Typesense returns 10 facet values unless told otherwise
export const MAX_FACET_VALUES = 250;

/**
 * Turns logical requests into per-collection query specs. Never touches the
 * network; invalid input fails here, before anything is sent.
 */
@Injectable()
export class QueryPlannerService {
  constructor(@Inject(searchConfig.KEY) private readonly config: SearchConfig) {}

  planTextSearch(request: TextSearchRequest): CollectionQuerySpec[] {
    this.validateCollections(request.collections);

    const vectorQuery = request.vector
      ? this.vectorClause(request.vector, request.alpha)
      : undefined;

    return request.collections.map(collection => {
      const filterBy = this.statusFilter(collection);
      return {
        collection,
        q: request.query,
        queryBy: QUERY_BY_FIELDS,
        includeFields: ['*'],
        excludeFields: [EMBEDDING_FIELD],
        ...(vectorQuery !== undefined && { vectorQuery }),
        ...(filterBy !== undefined && { filterBy }),
      };
    });
  }

  /**
   * Browse every document of one category in a collection.
   */
  planCategoryBrowse(collection: string, category: string): CollectionQuerySpec {
    return {
      collection,
      q: '*',
      filterBy: this.joinFilters(this.categoryFilter(category), this.statusFilter(collection)),
      excludeFields: [EMBEDDING_FIELD],
    };
  }

  /**
   * Facet counts only: which category values exist in the collection.
   * Pass `publishedOnly: false` to count drafts in the published collection
   * too.
   */
  planFacetDiscovery(collection: string, { publishedOnly = true } = {}): CollectionQuerySpec {
    const filterBy = publishedOnly ? this.statusFilter(collection) : undefined;
    return {
      collection,
      q: '*',
      facetBy: CATEGORY_FIELD,
      maxFacetValues: MAX_FACET_VALUES,
      perPage: 0,
      ...(filterBy !== undefined && { filterBy }),
    };
  }

  /**
   * Browse spec that fetches only what scoring needs.
   */
  planCategoryScoring(collection: string, category: string): CollectionQuerySpec {
    return {
      collection,
      q: '*',
      filterBy: this.joinFilters(this.categoryFilter(category), this.statusFilter(collection)),
      includeFields: ['id', 'titulo'],
    };
  }

  planMultiCategoryBrowse(collections: string[], category: string): CollectionQuerySpec[] {
    this.validateCollections(collections);
    return collections.map(collection => this.planCategoryBrowse(collection, category));
  }

  /**
   * `embedding:([c1, c2, ...], alpha:A)` with components at 6 decimals.
   */
  vectorClause(vector: number[], alpha: number): string {
    const components = vector.map(value => value.toFixed(6)).join(', ');
    return `${EMBEDDING_FIELD}:([${components}], alpha:${alpha.toFixed(1)})`;
  }

  validateCollections(collections: string[]): void {
    if (collections.length === 0) {
      throw new InvalidRequestError('At least one collection is required');
    }
  }

  private categoryFilter(category: string): string {
    if (category.trim().length === 0) {
      throw new InvalidRequestError('Category is required');
    }
    if (category.includes('`')) {
      throw new InvalidRequestError(`Category contains a backtick: ${category}`);
    }
    return `${CATEGORY_FIELD}:=\`${category}\``;
  }

  private statusFilter(collection: string): string | undefined {
    return collection === this.config.collections.published ? PUBLISHED_STATUS_FILTER : undefined;
  }

  private joinFilters(...filters: Array<string | undefined>): string {
    return filters.filter((filter): filter is string => filter !== undefined).join(' && ');
  }
}
