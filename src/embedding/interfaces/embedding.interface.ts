export const EMBEDDING_PROVIDER = 'EMBEDDING_PROVIDER';

/**
 * Turns text into a dense vector for hybrid search.
 *
 * Implementations raise EmbeddingUnavailableError when they cannot produce a
 * vector, and DimensionMismatchError when the vector has the wrong length.
 * Callers truncate the text before calling.
 */
export interface EmbeddingProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}
