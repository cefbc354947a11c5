export const RELEVANCE_SOURCE = 'RELEVANCE_SOURCE';

export interface RelevanceSource {
  /**
   * Integer relevance for a document title; 0 when the title is unknown.
   */
  scoreByTitle(title: string): number;
}

/**
 * One row of access volumetry as found in the relevance data file.
 */
export interface VolumetryEntry {
  title: string;
  accesses: number;
  source: string;
}

export interface RelevanceItem extends VolumetryEntry {
  relevance: number;
}
