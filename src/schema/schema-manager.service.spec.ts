import { Test, TestingModule } from '@nestjs/testing';
import { SchemaManagerService } from './schema-manager.service';
import searchConfig from '../config/search.config';
import { NotFoundError, UpstreamError } from '../common/errors/search.errors';
import { DOCUMENT_STORE } from '../storage/interfaces/document-store.interface';
import { FakeDocumentStore } from '../testing/fake-document-store';
import { OVERLAY, PUBLISHED, testSearchConfig } from '../testing/search-config.fixture';

describe('SchemaManagerService', () => {
  let service: SchemaManagerService;
  let store: FakeDocumentStore;

  beforeEach(async () => {
    store = new FakeDocumentStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SchemaManagerService,
        { provide: DOCUMENT_STORE, useValue: store },
        { provide: searchConfig.KEY, useValue: testSearchConfig() },
      ],
    }).compile();

    service = module.get<SchemaManagerService>(SchemaManagerService);
  });

  it('should leave an existing collection untouched', async () => {
    store.withCollection(PUBLISHED);
    const create = jest.spyOn(store, 'createCollection');

    await service.ensureCollectionExists(PUBLISHED);

    expect(create).not.toHaveBeenCalled();
  });

  it('should create a missing collection with the schema declared for its name', async () => {
    await service.ensureCollectionExists(OVERLAY);

    expect(store.created).toHaveLength(1);
    expect(store.created[0].name).toBe(OVERLAY);
    expect(store.created[0].defaultSortingField).toBe('criado_em');
    expect(store.created[0].fields.map(field => field.name)).toEqual([
      'id',
      'origem',
      'id_servico_antigo',
      'id_servico_novo',
      'criado_em',
      'criado_por',
      'observacoes',
      'embedding',
    ]);
  });

  it('should fall back to the published-records schema for unknown names', async () => {
    await service.ensureCollectionExists('something_else');

    expect(store.created[0]).toMatchObject({
      name: 'something_else',
      defaultSortingField: 'last_update',
      enableNestedFields: true,
    });
  });

  it('should treat a concurrent create as success', async () => {
    jest
      .spyOn(store, 'retrieveCollection')
      .mockRejectedValueOnce(new NotFoundError(`Collection ${OVERLAY} not found`, OVERLAY));
    store.withCollection(OVERLAY);

    await expect(service.ensureCollectionExists(OVERLAY)).resolves.toBeUndefined();
    expect(store.created).toHaveLength(0);
  });

  it('should propagate retrieval errors other than not found', async () => {
    store.failures.set(PUBLISHED, new UpstreamError('Typesense request failed: Not Ready', 503));

    await expect(service.ensureCollectionExists(PUBLISHED)).rejects.toBeInstanceOf(UpstreamError);
  });

  it('should remember a successful check', async () => {
    store.withCollection(PUBLISHED);
    const retrieve = jest.spyOn(store, 'retrieveCollection');

    await service.ensureCollectionExists(PUBLISHED);
    await service.ensureCollectionExists(PUBLISHED);

    expect(retrieve).toHaveBeenCalledTimes(1);
  });

  it('should retry after a failed check', async () => {
    store.failures.set(PUBLISHED, new UpstreamError('down', 503));
    await expect(service.ensureCollectionExists(PUBLISHED)).rejects.toThrow('down');

    store.failures.delete(PUBLISHED);
    store.withCollection(PUBLISHED);

    await expect(service.ensureCollectionExists(PUBLISHED)).resolves.toBeUndefined();
  });

  it('should not throw from ensureAll when a collection cannot be verified', async () => {
    store.failures.set(PUBLISHED, new UpstreamError('down', 503));

    await expect(service.ensureAll()).resolves.toBeUndefined();
    expect(store.created.map(schema => schema.name)).toEqual([
      OVERLAY,
      'service_versions',
      'hub_search',
    ]);
  });
});
