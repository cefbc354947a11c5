import { toLogicalDocument } from './document-mapper';

describe('toLogicalDocument', () => {
  it('should type known fields and keep the rest as extra fields', () => {
    const doc = toLogicalDocument('c1', {
      id: 'a1',
      titulo: 'Segunda via do IPTU',
      category: 'Taxas',
      status: 1,
      resumo: 'Emita a guia',
      embedding: [0.1, 0.2],
    });

    expect(doc).toEqual({
      collection: 'c1',
      id: 'a1',
      title: 'Segunda via do IPTU',
      category: 'Taxas',
      status: 1,
      extraFields: { resumo: 'Emita a guia' },
    });
  });

  it('should take the title from the first field that carries one', () => {
    const doc = toLogicalDocument('c1', { id: 'a1', title: 'English', nome_servico: 'Serviço' });

    expect(doc.title).toBe('English');
    expect(doc.extraFields).toEqual({ nome_servico: 'Serviço' });
  });

  it('should fall back to nome_servico', () => {
    expect(toLogicalDocument('c1', { id: 'a1', nome_servico: 'Serviço' }).title).toBe('Serviço');
  });

  it('should leave absent known fields undefined', () => {
    const doc = toLogicalDocument('c1', { id: 7, status: '1' });

    expect(doc).toEqual({ collection: 'c1', id: '7', extraFields: {} });
  });
});
