import {
  CollectionAlreadyExistsError,
  NotFoundError,
} from '../common/errors/search.errors';
import { CollectionSchema } from '../schema/interfaces/schema.interface';
import { DocumentFields } from '../search/interfaces/search.interface';
import {
  CollectionQuerySpec,
  DocumentStore,
  FacetValueCount,
  MultiSearchSlot,
  SearchQuery,
  StoreSearchResult,
} from '../storage/interfaces/document-store.interface';

export interface FakeDocument {
  fields: DocumentFields;
  textMatch?: number;
  vectorDistance?: number;
}

/**
 * In-process stand-in for the backing store. Understands `field:=value`
 * filters joined by `&&`, facet counting, include_fields and paging with
 * Typesense's defaults (page 1, 10 per page, 10 facet values).
 */
export class FakeDocumentStore implements DocumentStore {
  readonly searchCalls: Array<{ collection: string; query: SearchQuery }> = [];
  readonly multiSearchCalls: CollectionQuerySpec[][] = [];
  readonly created: CollectionSchema[] = [];
  readonly failures = new Map<string, Error>();

  private readonly collections = new Map<string, FakeDocument[]>();

  withCollection(name: string, documents: FakeDocument[] = []): this {
    this.collections.set(name, documents);
    return this;
  }

  async multiSearch(specs: CollectionQuerySpec[]): Promise<MultiSearchSlot[]> {
    this.multiSearchCalls.push(specs);
    return specs.map(spec => {
      try {
        return { ok: true, result: this.run(spec.collection, spec) };
      } catch (error) {
        return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
      }
    });
  }

  async search(collection: string, query: SearchQuery): Promise<StoreSearchResult> {
    this.searchCalls.push({ collection, query });
    return this.run(collection, query);
  }

  async getDocument(collection: string, id: string): Promise<DocumentFields> {
    const found = this.documentsOf(collection).find(doc => doc.fields.id === id);
    if (!found) {
      throw new NotFoundError(
        `Document ${id} in collection ${collection} not found`,
        collection,
        id,
      );
    }
    return { ...found.fields };
  }

  async retrieveCollection(name: string): Promise<void> {
    this.documentsOf(name);
  }

  async createCollection(schema: CollectionSchema): Promise<void> {
    if (this.collections.has(schema.name)) {
      throw new CollectionAlreadyExistsError(schema.name);
    }
    this.created.push(schema);
    this.collections.set(schema.name, []);
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  private documentsOf(collection: string): FakeDocument[] {
    const failure = this.failures.get(collection);
    if (failure) {
      throw failure;
    }
    const documents = this.collections.get(collection);
    if (!documents) {
      throw new NotFoundError(`Collection ${collection} not found`, collection);
    }
    return documents;
  }

  private run(collection: string, query: SearchQuery): StoreSearchResult {
    const matching = this.documentsOf(collection).filter(doc => this.matches(doc, query.filterBy));

    const facets: Record<string, FacetValueCount[]> = {};
    if (query.facetBy) {
      const counts = new Map<string, number>();
      for (const doc of matching) {
        const value = doc.fields[query.facetBy];
        if (typeof value === 'string') {
          counts.set(value, (counts.get(value) ?? 0) + 1);
        }
      }
      facets[query.facetBy] = [...counts]
        .sort(([, a], [, b]) => b - a)
        .slice(0, query.maxFacetValues ?? 10)
        .map(([value, count]) => ({ value, count }));
    }

    const page = query.page ?? 1;
    const perPage = query.perPage ?? 10;
    const slice = matching.slice((page - 1) * perPage, page * perPage);

    return {
      found: matching.length,
      hits: slice.map(doc => ({
        document: this.project(doc.fields, query.includeFields),
        textMatch: BigInt(doc.textMatch ?? 0),
        ...(query.vectorQuery !== undefined &&
          doc.vectorDistance !== undefined && { vectorDistance: doc.vectorDistance }),
      })),
      facets,
    };
  }

  private matches(doc: FakeDocument, filterBy?: string): boolean {
    if (!filterBy) {
      return true;
    }
    return filterBy.split('&&').every(clause => {
      const [field, raw] = clause.trim().split(':=');
      const expected = raw.replace(/^`|`$/g, '');
      return String(doc.fields[field]) === expected;
    });
  }

  private project(fields: DocumentFields, include?: string[]): DocumentFields {
    if (!include || include.includes('*')) {
      return { ...fields };
    }
    const projected: DocumentFields = {};
    for (const name of include) {
      if (name in fields) {
        projected[name] = fields[name];
      }
    }
    return projected;
  }
}
