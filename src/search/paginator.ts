const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

/**
 * Slice of a merged sequence for a 1-based page.
 */
export function paginate<T>(items: readonly T[], page: number, perPage: number): T[] {
  const start = clamp((page - 1) * perPage, 0, items.length);
  const end = clamp(start + perPage, start, items.length);
  return items.slice(start, end);
}
