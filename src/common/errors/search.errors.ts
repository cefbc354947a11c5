/**
 * Raised before any network call when a request cannot be planned
 * (no target collections, malformed filter value).
 */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

/**
 * A specific collection or document does not exist in the backing store.
 */
export class NotFoundError extends Error {
  constructor(
    message: string,
    readonly collection?: string,
    readonly documentId?: string,
  ) {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class CollectionAlreadyExistsError extends Error {
  constructor(readonly collection: string) {
    super(`Collection ${collection} already exists`);
    this.name = 'CollectionAlreadyExistsError';
    Object.setPrototypeOf(this, CollectionAlreadyExistsError.prototype);
  }
}

/**
 * Any other backing-store failure.
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'UpstreamError';
    Object.setPrototypeOf(this, UpstreamError.prototype);
  }
}

/**
 * The embedding provider is not configured or the call failed.
 * Search degrades to text-only when this is raised.
 */
export class EmbeddingUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingUnavailableError';
    Object.setPrototypeOf(this, EmbeddingUnavailableError.prototype);
  }
}

export class DimensionMismatchError extends EmbeddingUnavailableError {
  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`Embedding has ${actual} dimensions, expected ${expected}`);
    this.name = 'DimensionMismatchError';
    Object.setPrototypeOf(this, DimensionMismatchError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
