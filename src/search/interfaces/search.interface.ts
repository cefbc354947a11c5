export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

/**
 * Raw field bag as stored in a collection.
 */
export type DocumentFields = Record<string, FieldValue>;

/**
 * A stored document with its known fields typed and everything else kept
 * in `extraFields`. The embedding vector is never carried.
 */
export interface LogicalDocument {
  collection: string;
  id: string;
  title?: string;
  category?: string;
  status?: number;
  extraFields: DocumentFields;
}

export interface SearchHit {
  document: LogicalDocument;
  textMatchScore: bigint;
  vectorDistance?: number;
  sourceCollection: string;
}

/**
 * A hit carrying an externally supplied relevance score, used by
 * category-scoped results.
 */
export interface ScoredHit {
  document: LogicalDocument;
  relevance: number;
}

export interface MergedResult {
  found: number;
  page: number;
  hits: LogicalDocument[];
}

export interface TextSearchRequest {
  collections: string[];
  query: string;
  vector?: number[];
  alpha: number;
}

export interface CategoryRelevance {
  name: string;
  normalizedName: string;
  totalRelevance: number;
  documentCount: number;
  averageRelevance: number;
}

export interface CategoryRelevanceReport {
  categories: CategoryRelevance[];
  totalCategories: number;
  lastUpdated: string;
}
