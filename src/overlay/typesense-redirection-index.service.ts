import { Inject, Injectable } from '@nestjs/common';
import searchConfig, { SearchConfig } from '../config/search.config';
import { InvalidRequestError } from '../common/errors/search.errors';
import { SchemaManagerService } from '../schema/schema-manager.service';
import { DocumentFields } from '../search/interfaces/search.interface';
import { DOCUMENT_STORE, DocumentStore } from '../storage/interfaces/document-store.interface';
import { RedirectionEntry, RedirectionIndex } from './interfaces/redirection.interface';

const quoted = (value: string): string => {
  if (value.includes('`')) {
    throw new InvalidRequestError(`Cannot filter on value containing a backtick: ${value}`);
  }
  return `\`${value}\``;
};

const stringField = (fields: DocumentFields, name: string): string | undefined => {
  const value = fields[name];
  return typeof value === 'string' ? value : undefined;
};

export function toRedirectionEntry(fields: DocumentFields): RedirectionEntry | undefined {
  const legacyCollection = stringField(fields, 'origem');
  const legacyDocumentId = stringField(fields, 'id_servico_antigo');
  const replacementDocumentId = stringField(fields, 'id_servico_novo');
  if (!legacyCollection || !legacyDocumentId || !replacementDocumentId) {
    return undefined;
  }
  const createdAt = fields.criado_em;
  const notes = stringField(fields, 'observacoes');
  return {
    legacyCollection,
    legacyDocumentId,
    replacementDocumentId,
    createdAt: typeof createdAt === 'number' ? createdAt : 0,
    createdBy: stringField(fields, 'criado_por') ?? '',
    ...(notes !== undefined && { notes }),
  };
}

/**
 * Reads redirection entries from the overlay collection, creating the
 * collection on first use.
 */
@Injectable()
export class TypesenseRedirectionIndex implements RedirectionIndex {
  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(searchConfig.KEY) private readonly config: SearchConfig,
    private readonly schemaManager: SchemaManagerService,
  ) {}

  async lookup(
    legacyCollection: string,
    legacyId: string,
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    const entry = await this.findEntry(legacyCollection, legacyId, signal);
    return entry?.replacementDocumentId;
  }

  async findEntry(
    legacyCollection: string,
    legacyId: string,
    signal?: AbortSignal,
  ): Promise<RedirectionEntry | undefined> {
    const overlay = this.config.collections.overlay;
    await this.schemaManager.ensureCollectionExists(overlay);

    const result = await this.store.search(
      overlay,
      {
        q: '*',
        filterBy: `origem:=${quoted(legacyCollection)} && id_servico_antigo:=${quoted(legacyId)}`,
        page: 1,
        perPage: 1,
      },
      signal,
    );

    const [hit] = result.hits;
    return hit ? toRedirectionEntry(hit.document) : undefined;
  }
}
