import { denormalizeCategory, normalizeCategory, normalizeTitle } from './normalize';
import { CANONICAL_CATEGORIES } from '../../constants/categories';

describe('normalize', () => {
  describe('normalizeCategory', () => {
    it('should strip accents and lower-case', () => {
      expect(normalizeCategory('Saúde')).toBe('saude');
      expect(normalizeCategory('Educação')).toBe('educacao');
      expect(normalizeCategory('Emergência')).toBe('emergencia');
    });

    it('should leave plain names lower-cased', () => {
      expect(normalizeCategory('Transporte')).toBe('transporte');
    });

    it('should return an empty string unchanged', () => {
      expect(normalizeCategory('')).toBe('');
    });
  });

  describe('denormalizeCategory', () => {
    it('should find the canonical spelling', () => {
      expect(denormalizeCategory('licencas', CANONICAL_CATEGORIES)).toBe('Licenças');
      expect(denormalizeCategory('SAUDE', CANONICAL_CATEGORIES)).toBe('Saúde');
    });

    it('should return the input when nothing matches', () => {
      expect(denormalizeCategory('Nova Categoria', CANONICAL_CATEGORIES)).toBe('Nova Categoria');
    });
  });

  describe('normalizeTitle', () => {
    it('should trim before normalizing', () => {
      expect(normalizeTitle('  Emissão de IPTU ')).toBe('emissao de iptu');
    });
  });
});
