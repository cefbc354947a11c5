import { Test, TestingModule } from '@nestjs/testing';
import { FanoutExecutorService } from './fanout-executor.service';
import searchConfig from '../config/search.config';
import { UpstreamError } from '../common/errors/search.errors';
import { DOCUMENT_STORE } from '../storage/interfaces/document-store.interface';
import { FakeDocument, FakeDocumentStore } from '../testing/fake-document-store';
import { testSearchConfig } from '../testing/search-config.fixture';

const docs = (count: number, category = 'Taxas'): FakeDocument[] =>
  Array.from({ length: count }, (_, i) => ({ fields: { id: `d${i}`, category } }));

describe('FanoutExecutorService', () => {
  let executor: FanoutExecutorService;
  let store: FakeDocumentStore;

  const createExecutor = async (browsePageSize = 250): Promise<FanoutExecutorService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FanoutExecutorService,
        { provide: DOCUMENT_STORE, useValue: store },
        { provide: searchConfig.KEY, useValue: testSearchConfig({ browsePageSize }) },
      ],
    }).compile();
    return module.get<FanoutExecutorService>(FanoutExecutorService);
  };

  beforeEach(async () => {
    store = new FakeDocumentStore();
    executor = await createExecutor();
  });

  describe('executeBatch', () => {
    it('should return one result per spec in submission order', async () => {
      store.withCollection('c1', docs(2)).withCollection('c2', docs(1));

      const results = await executor.executeBatch([
        { collection: 'c2', q: '*' },
        { collection: 'c1', q: '*' },
      ]);

      expect(results.map(({ collection, result }) => [collection, result.found])).toEqual([
        ['c2', 1],
        ['c1', 2],
      ]);
      expect(store.multiSearchCalls).toHaveLength(1);
    });

    it('should treat a missing collection as empty', async () => {
      store.withCollection('c1', docs(2));

      const results = await executor.executeBatch([
        { collection: 'c1', q: '*' },
        { collection: 'gone', q: '*' },
      ]);

      expect(results[1]).toEqual({ collection: 'gone', result: { hits: [], found: 0, facets: {} } });
    });

    it('should skip a collection whose slot failed', async () => {
      store.withCollection('c1', docs(2)).withCollection('c2', docs(1));
      store.failures.set('c2', new UpstreamError('boom', 500));

      const results = await executor.executeBatch([
        { collection: 'c1', q: '*' },
        { collection: 'c2', q: '*' },
      ]);

      expect(results.map(({ result }) => result.hits.length)).toEqual([2, 0]);
    });

    it('should propagate a failure of the batch call itself', async () => {
      jest.spyOn(store, 'multiSearch').mockRejectedValue(new UpstreamError('down', 503));

      await expect(executor.executeBatch([{ collection: 'c1', q: '*' }])).rejects.toThrow('down');
    });

    it('should not call the store for an empty batch', async () => {
      await expect(executor.executeBatch([])).resolves.toEqual([]);
      expect(store.multiSearchCalls).toHaveLength(0);
    });
  });

  describe('executeSingle', () => {
    it('should propagate errors unchanged', async () => {
      const failure = new UpstreamError('boom', 500);
      store.failures.set('c1', failure);

      await expect(executor.executeSingle('c1', { q: '*' })).rejects.toBe(failure);
    });
  });

  describe('walkPages', () => {
    it('should fetch 260 documents in two pages of 250', async () => {
      store.withCollection('c1', docs(260));
      const seen: string[] = [];

      const fetches = await executor.walkPages('c1', { q: '*' }, ({ hits }) => {
        hits.forEach(hit => seen.push(String(hit.document.id)));
      });

      expect(fetches).toBe(2);
      expect(seen).toHaveLength(260);
      expect(store.searchCalls.map(call => [call.query.page, call.query.perPage])).toEqual([
        [1, 250],
        [2, 250],
      ]);
    });

    it('should make one extra request when the last page is exactly full', async () => {
      store.withCollection('c1', docs(4));
      executor = await createExecutor(2);

      const fetches = await executor.walkPages('c1', { q: '*' }, () => undefined);

      expect(fetches).toBe(3);
    });

    it('should cap the requested page size at the ceiling', async () => {
      store.withCollection('c1', docs(3));
      executor = await createExecutor(2);

      await executor.walkPages('c1', { q: '*', perPage: 100 }, () => undefined);

      expect(store.searchCalls[0].query.perPage).toBe(2);
    });

    it('should stop before the next fetch once cancelled', async () => {
      store.withCollection('c1', docs(5));
      executor = await createExecutor(2);
      const controller = new AbortController();

      const walk = executor.walkPages(
        'c1',
        { q: '*' },
        () => controller.abort(new Error('cancelled')),
        controller.signal,
      );

      await expect(walk).rejects.toThrow('cancelled');
      expect(store.searchCalls).toHaveLength(1);
    });
  });
});
