/**
 * Chunking Types
 */

export interface ChunkingOptions {
  /** Nominal chunk length in characters */
  chunkSize: number;
  /** Characters shared by consecutive chunks */
  overlap: number;
  /** Inserted between consecutive page texts when concatenating */
  pageSeparator?: string;
  /** Characters before the nominal cut searched for a clean break */
  boundaryLookback?: number;
}

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;
export const DEFAULT_PAGE_SEPARATOR = '\n\n';
export const DEFAULT_BOUNDARY_LOOKBACK = 100;

/**
 * Character range a page occupies in the concatenated document text,
 * including the separator that follows it.
 */
export interface PageSpan {
  pageNumber: number;
  start: number;
  end: number;
}

export interface ConcatenatedDocument {
  text: string;
  spans: PageSpan[];
}
