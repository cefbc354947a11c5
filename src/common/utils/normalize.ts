const COMBINING_MARKS = /[\u0300-\u036f]/g;

/**
 * Strips diacritics and lower-cases a category name so clients can match it
 * regardless of case or accents: "Saúde" -> "saude".
 */
export function normalizeCategory(category: string): string {
  if (!category) {
    return category;
  }
  return category.normalize('NFD').replace(COMBINING_MARKS, '').normalize('NFC').toLowerCase();
}

/**
 * Maps a category in any case or accenting back to its canonical spelling,
 * or returns the input when no canonical name matches.
 */
export function denormalizeCategory(category: string, canonical: readonly string[]): string {
  const normalized = normalizeCategory(category);
  return canonical.find(name => normalizeCategory(name) === normalized) ?? category;
}

/**
 * Key used to match document titles against volumetry entries.
 */
export function normalizeTitle(title: string): string {
  return normalizeCategory(title.trim());
}
