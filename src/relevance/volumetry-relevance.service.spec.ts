import { join } from 'path';
import { Test, TestingModule } from '@nestjs/testing';
import { VolumetryRelevanceService, percentile } from './volumetry-relevance.service';
import searchConfig from '../config/search.config';
import { testSearchConfig } from '../testing/search-config.fixture';

const FIXTURE = join(__dirname, 'fixtures', 'volumetry.json');

describe('VolumetryRelevanceService', () => {
  const createService = async (relevanceDataPath: string): Promise<VolumetryRelevanceService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        VolumetryRelevanceService,
        { provide: searchConfig.KEY, useValue: testSearchConfig({ relevanceDataPath }) },
      ],
    }).compile();
    return module.get<VolumetryRelevanceService>(VolumetryRelevanceService);
  };

  describe('percentile', () => {
    it('should use the last position not above the value', () => {
      const sorted = [10, 20, 20, 40];

      expect(percentile(10, sorted)).toBe(0);
      expect(percentile(20, sorted)).toBe(50);
      expect(percentile(40, sorted)).toBe(75);
      expect(percentile(5, sorted)).toBe(0);
    });

    it('should be 0 with no data', () => {
      expect(percentile(10, [])).toBe(0);
    });
  });

  describe('loadEntries', () => {
    it('should score titles by access percentile', async () => {
      const service = await createService('');

      const count = service.loadEntries([
        { title: 'A', accesses: 10, source: '1746' },
        { title: 'B', accesses: 20, source: '1746' },
        { title: 'C', accesses: 30, source: '1746' },
        { title: 'D', accesses: 40, source: '1746' },
      ]);

      expect(count).toBe(4);
      expect(['A', 'B', 'C', 'D'].map(title => service.scoreByTitle(title))).toEqual([
        0, 25, 50, 75,
      ]);
    });

    it('should match titles regardless of case, accents and padding', async () => {
      const service = await createService('');
      service.loadEntries([
        { title: 'Saúde da família', accesses: 1, source: '1746' },
        { title: 'Outro', accesses: 2, source: '1746' },
      ]);

      expect(service.scoreByTitle('  saude da FAMILIA ')).toBe(0);
      expect(service.scoreByTitle('outro')).toBe(50);
    });

    it('should score unknown titles as 0', async () => {
      const service = await createService('');
      service.loadEntries([{ title: 'Known', accesses: 1, source: '1746' }]);

      expect(service.scoreByTitle('Unknown')).toBe(0);
    });
  });

  describe('loading from file', () => {
    it('should merge duplicates and skip malformed rows', async () => {
      const service = await createService(FIXTURE);

      await service.onModuleInit();

      expect(service.scoreByTitle('Remoção de entulho')).toBe(0);
      expect(service.scoreByTitle('Matrícula escolar')).toBe(33);
      expect(service.scoreByTitle('Segunda via do IPTU')).toBe(66);
      expect(service.lastLoaded).toBeInstanceOf(Date);
    });

    it('should return the number of distinct titles', async () => {
      const service = await createService('');

      await expect(service.loadFromFile(FIXTURE)).resolves.toBe(3);
    });

    it('should start with empty data when the file is missing', async () => {
      const service = await createService(join(__dirname, 'fixtures', 'missing.json'));

      await expect(service.onModuleInit()).resolves.toBeUndefined();
      expect(service.scoreByTitle('Segunda via do IPTU')).toBe(0);
      expect(service.lastLoaded).toBeUndefined();
    });
  });
});
