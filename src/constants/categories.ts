/**
 * Canonical category names. Every one of them appears in category relevance
 * output, even with no matching documents.
 */
export const CANONICAL_CATEGORIES: readonly string[] = [
  'Cidade',
  'Transporte',
  'Saúde',
  'Educação',
  'Ambiente',
  'Taxas',
  'Cidadania',
  'Emergência',
  'Servidor',
  'Segurança',
  'Trabalho',
  'Família',
  'Cultura',
  'Licenças',
  'Esportes',
  'Animais',
];

export const CATEGORY_FIELD = 'category';
