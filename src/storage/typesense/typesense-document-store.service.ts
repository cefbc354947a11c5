import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import {
  CollectionAlreadyExistsError,
  NotFoundError,
  UpstreamError,
  errorMessage,
} from '../../common/errors/search.errors';
import { rethrowIfAborted } from '../../common/utils/abort';
import { CollectionSchema } from '../../schema/interfaces/schema.interface';
import { DocumentFields } from '../../search/interfaces/search.interface';
import {
  CollectionQuerySpec,
  DocumentStore,
  FacetValueCount,
  MultiSearchSlot,
  SearchQuery,
  StoreSearchResult,
} from '../interfaces/document-store.interface';
import {
  TYPESENSE_HTTP,
  TypesenseMultiSearchEntry,
  TypesenseMultiSearchResponse,
  TypesenseSearchParams,
  TypesenseSearchResponse,
  toTypesenseCollection,
} from './typesense.types';

interface ErrorContext {
  collection?: string;
  documentId?: string;
}

/**
 * DocumentStore over the Typesense HTTP API.
 */
@Injectable()
export class TypesenseDocumentStore implements DocumentStore {
  private readonly logger = new Logger(TypesenseDocumentStore.name);

  constructor(@Inject(TYPESENSE_HTTP) private readonly http: AxiosInstance) {}

  async multiSearch(
    specs: CollectionQuerySpec[],
    signal?: AbortSignal,
  ): Promise<MultiSearchSlot[]> {
    const searches: TypesenseMultiSearchEntry[] = specs.map(spec => ({
      collection: spec.collection,
      ...this.toSearchParams(spec),
    }));

    let data: TypesenseMultiSearchResponse;
    try {
      ({ data } = await this.http.post<TypesenseMultiSearchResponse>(
        '/multi_search',
        { searches },
        { signal },
      ));
    } catch (error) {
      rethrowIfAborted(error, signal);
      throw this.translateError(error, {});
    }

    return specs.map((spec, i): MultiSearchSlot => {
      const slot = data.results[i];
      if (!slot) {
        return {
          ok: false,
          error: new UpstreamError(`No multi_search result for collection ${spec.collection}`),
        };
      }
      if (slot.error !== undefined) {
        return { ok: false, error: this.slotError(spec.collection, slot.error, slot.code) };
      }
      return { ok: true, result: this.toResult(slot) };
    });
  }

  async search(
    collection: string,
    query: SearchQuery,
    signal?: AbortSignal,
  ): Promise<StoreSearchResult> {
    try {
      const { data } = await this.http.get<TypesenseSearchResponse>(
        `/collections/${encodeURIComponent(collection)}/documents/search`,
        { params: this.toSearchParams(query), signal },
      );
      return this.toResult(data);
    } catch (error) {
      rethrowIfAborted(error, signal);
      throw this.translateError(error, { collection });
    }
  }

  async getDocument(collection: string, id: string, signal?: AbortSignal): Promise<DocumentFields> {
    try {
      const { data } = await this.http.get<DocumentFields>(
        `/collections/${encodeURIComponent(collection)}/documents/${encodeURIComponent(id)}`,
        { signal },
      );
      return data;
    } catch (error) {
      rethrowIfAborted(error, signal);
      throw this.translateError(error, { collection, documentId: id });
    }
  }

  async retrieveCollection(name: string): Promise<void> {
    try {
      await this.http.get(`/collections/${encodeURIComponent(name)}`);
    } catch (error) {
      throw this.translateError(error, { collection: name });
    }
  }

  async createCollection(schema: CollectionSchema): Promise<void> {
    try {
      await this.http.post('/collections', toTypesenseCollection(schema));
      this.logger.log(`Created collection ${schema.name}`);
    } catch (error) {
      throw this.translateError(error, { collection: schema.name });
    }
  }

  async isHealthy(): Promise<boolean> {
    try {
      const { data } = await this.http.get<{ ok?: boolean }>('/health');
      return data.ok === true;
    } catch (error) {
      this.logger.warn(`Typesense health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private toSearchParams(query: SearchQuery): TypesenseSearchParams {
    return {
      q: query.q,
      ...(query.queryBy && { query_by: query.queryBy.join(',') }),
      ...(query.filterBy !== undefined && { filter_by: query.filterBy }),
      ...(query.facetBy !== undefined && { facet_by: query.facetBy }),
      ...(query.maxFacetValues !== undefined && { max_facet_values: query.maxFacetValues }),
      ...(query.vectorQuery !== undefined && { vector_query: query.vectorQuery }),
      ...(query.includeFields && { include_fields: query.includeFields.join(',') }),
      ...(query.excludeFields && { exclude_fields: query.excludeFields.join(',') }),
      ...(query.page !== undefined && { page: query.page }),
      ...(query.perPage !== undefined && { per_page: query.perPage }),
    };
  }

  private toResult(response: TypesenseSearchResponse): StoreSearchResult {
    const facets: Record<string, FacetValueCount[]> = {};
    for (const facet of response.facet_counts ?? []) {
      facets[facet.field_name] = facet.counts.map(({ value, count }) => ({ value, count }));
    }

    return {
      found: response.found ?? 0,
      hits: (response.hits ?? []).map(hit => ({
        document: hit.document,
        textMatch: BigInt(hit.text_match ?? 0),
        ...(hit.vector_distance !== undefined && { vectorDistance: hit.vector_distance }),
      })),
      facets,
    };
  }

  private slotError(collection: string, message: string, code?: number): Error {
    if (code === 404) {
      return new NotFoundError(`Collection ${collection} not found: ${message}`, collection);
    }
    return new UpstreamError(`Search on collection ${collection} failed: ${message}`, code);
  }

  private translateError(error: unknown, context: ErrorContext): Error {
    if (!axios.isAxiosError(error)) {
      return new UpstreamError(`Typesense request failed: ${errorMessage(error)}`);
    }

    const status = error.response?.status;
    const body: unknown = error.response?.data;
    const detail =
      typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string'
        ? body.message
        : error.message;

    if (status === 404) {
      const target = context.documentId
        ? `Document ${context.documentId} in collection ${context.collection}`
        : `Collection ${context.collection}`;
      return new NotFoundError(`${target} not found`, context.collection, context.documentId);
    }
    if (status === 409 && context.collection) {
      return new CollectionAlreadyExistsError(context.collection);
    }
    return new UpstreamError(`Typesense request failed: ${detail}`, status);
  }
}
