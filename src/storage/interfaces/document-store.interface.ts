import { CollectionSchema } from '../../schema/interfaces/schema.interface';
import { DocumentFields } from '../../search/interfaces/search.interface';

export const DOCUMENT_STORE = 'DOCUMENT_STORE';

/**
 * Backend-neutral search parameters. Field lists are joined by the store
 * adapter into whatever wire format it speaks.
 */
export interface SearchQuery {
  q: string;
  queryBy?: string[];
  filterBy?: string;
  facetBy?: string;
  maxFacetValues?: number;
  vectorQuery?: string;
  includeFields?: string[];
  excludeFields?: string[];
  page?: number;
  perPage?: number;
}

export interface CollectionQuerySpec extends SearchQuery {
  collection: string;
}

export interface StoreHit {
  document: DocumentFields;
  textMatch: bigint;
  vectorDistance?: number;
}

export interface FacetValueCount {
  value: string;
  count: number;
}

export interface StoreSearchResult {
  hits: StoreHit[];
  found: number;
  facets: Record<string, FacetValueCount[]>;
}

export type MultiSearchSlot =
  | { ok: true; result: StoreSearchResult }
  | { ok: false; error: Error };

/**
 * Contract with the backing store.
 *
 * Implementations raise NotFoundError for an absent collection or document,
 * CollectionAlreadyExistsError when creating a collection that exists, and
 * UpstreamError for everything else.
 */
export interface DocumentStore {
  /**
   * Runs all specs in one round trip. The returned slots line up with the
   * submitted specs; a slot failure does not fail the batch.
   */
  multiSearch(specs: CollectionQuerySpec[], signal?: AbortSignal): Promise<MultiSearchSlot[]>;

  search(collection: string, query: SearchQuery, signal?: AbortSignal): Promise<StoreSearchResult>;

  getDocument(collection: string, id: string, signal?: AbortSignal): Promise<DocumentFields>;

  /**
   * Resolves when the collection exists.
   */
  retrieveCollection(name: string): Promise<void>;

  createCollection(schema: CollectionSchema): Promise<void>;

  isHealthy(): Promise<boolean>;
}
