export {
  chunkPages,
  concatenatePages,
  pageAtOffset,
  splitsSurrogatePair,
  validateChunkingOptions,
} from './chunker';
export { reassembleText, pageForOffset } from './reassembly';
export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_PAGE_SEPARATOR,
  DEFAULT_BOUNDARY_LOOKBACK,
  type ChunkingOptions,
  type ConcatenatedDocument,
  type PageSpan,
} from './types';
