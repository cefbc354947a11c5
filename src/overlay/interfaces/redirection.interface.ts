export const REDIRECTION_INDEX = 'REDIRECTION_INDEX';

/**
 * A decommissioned legacy document and the published document replacing it.
 */
export interface RedirectionEntry {
  legacyCollection: string;
  legacyDocumentId: string;
  replacementDocumentId: string;
  createdAt: number;
  createdBy: string;
  notes?: string;
}

export interface RedirectionIndex {
  /**
   * Returns the replacement id for a legacy document, or undefined when the
   * document has not been decommissioned.
   */
  lookup(legacyCollection: string, legacyId: string, signal?: AbortSignal): Promise<string | undefined>;
}
