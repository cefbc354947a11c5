import { CollectionSchema } from '../../schema/interfaces/schema.interface';
import { DocumentFields } from '../../search/interfaces/search.interface';

export const TYPESENSE_HTTP = 'TYPESENSE_HTTP';

/**
 * Search parameters in Typesense's wire naming.
 */
export interface TypesenseSearchParams {
  q: string;
  query_by?: string;
  filter_by?: string;
  facet_by?: string;
  max_facet_values?: number;
  vector_query?: string;
  include_fields?: string;
  exclude_fields?: string;
  page?: number;
  per_page?: number;
}

export interface TypesenseMultiSearchEntry extends TypesenseSearchParams {
  collection: string;
}

export interface TypesenseHit {
  document: DocumentFields;
  // uint64; parsed to bigint once it no longer fits a double
  text_match?: number | bigint;
  vector_distance?: number;
}

export interface TypesenseFacetCount {
  field_name: string;
  counts: Array<{ value: string; count: number }>;
}

export interface TypesenseSearchResponse {
  found?: number;
  page?: number;
  hits?: TypesenseHit[];
  facet_counts?: TypesenseFacetCount[];
}

/**
 * A multi_search slot carries either a result or an error payload.
 */
export interface TypesenseMultiSearchSlot extends TypesenseSearchResponse {
  error?: string;
  code?: number;
}

export interface TypesenseMultiSearchResponse {
  results: TypesenseMultiSearchSlot[];
}

export interface TypesenseCollectionField {
  name: string;
  type: string;
  facet?: boolean;
  optional?: boolean;
  num_dim?: number;
}

export interface TypesenseCollection {
  name: string;
  fields: TypesenseCollectionField[];
  default_sorting_field?: string;
  enable_nested_fields?: boolean;
}

export function toTypesenseCollection(schema: CollectionSchema): TypesenseCollection {
  return {
    name: schema.name,
    fields: schema.fields.map(field => ({
      name: field.name,
      type: field.type,
      ...(field.facet !== undefined && { facet: field.facet }),
      ...(field.optional !== undefined && { optional: field.optional }),
      ...(field.numDim !== undefined && { num_dim: field.numDim }),
    })),
    default_sorting_field: schema.defaultSortingField,
    ...(schema.enableNestedFields !== undefined && {
      enable_nested_fields: schema.enableNestedFields,
    }),
  };
}
