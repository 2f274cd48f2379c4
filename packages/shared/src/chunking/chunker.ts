/**
 * Chunker
 *
 * Splits page text into overlapping chunks. Each chunk starts exactly
 * `overlap` characters before the previous chunk ended, so the chunk
 * sequence can be reassembled into the original text.
 *
 * Cuts prefer a sentence break, then whitespace, within a short lookback
 * window before the nominal cut point. The lookback is clamped so that
 * every step still advances the window.
 */

import { InvalidConfigurationError } from '../errors';
import type { Chunk, PageText } from '../types';
import {
  DEFAULT_BOUNDARY_LOOKBACK,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_PAGE_SEPARATOR,
  type ChunkingOptions,
  type ConcatenatedDocument,
  type PageSpan,
} from './types';

const SENTENCE_BREAK_PATTERN = /[.!?]\s|\n\n/g;
const WHITESPACE_PATTERN = /\s/g;

/**
 * Reject unusable options before any work is done.
 */
export function validateChunkingOptions(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(
      `chunk_size must be a positive integer, got ${chunkSize}`
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigurationError(
      `overlap must be a non-negative integer, got ${overlap}`
    );
  }
  if (overlap >= chunkSize) {
    throw new InvalidConfigurationError(
      `overlap (${overlap}) must be smaller than chunk_size (${chunkSize})`
    );
  }
}

/**
 * Concatenate page texts in page order, remembering where each page sits.
 * Pages with no text contribute nothing.
 */
export function concatenatePages(
  pages: readonly PageText[],
  separator: string = DEFAULT_PAGE_SEPARATOR
): ConcatenatedDocument {
  const ordered = pages
    .filter((page) => page.text.length > 0)
    .sort((a, b) => a.pageNumber - b.pageNumber);

  const spans: PageSpan[] = [];
  let text = '';

  ordered.forEach((page, i) => {
    const start = text.length;
    text += page.text;
    if (i < ordered.length - 1) {
      text += separator;
    }
    spans.push({ pageNumber: page.pageNumber, start, end: text.length });
  });

  return { text, spans };
}

/**
 * Page containing the given offset of the concatenated text.
 */
export function pageAtOffset(spans: readonly PageSpan[], offset: number): number {
  let pageNumber = spans.length > 0 ? spans[0].pageNumber : 0;
  for (const span of spans) {
    if (span.start > offset) break;
    pageNumber = span.pageNumber;
  }
  return pageNumber;
}

function lastMatchEnd(pattern: RegExp, text: string): number | null {
  let end: number | null = null;
  for (const match of text.matchAll(pattern)) {
    end = (match.index ?? 0) + match[0].length;
  }
  return end;
}

/**
 * Pick the cut point for a window ending nominally at `end`.
 */
function findCut(text: string, end: number, lookback: number): number {
  if (end >= text.length || lookback <= 0) return end;
  // Already on a word boundary
  if (/\s/.test(text[end]) || /\s/.test(text[end - 1])) return end;

  const windowStart = end - lookback;
  const window = text.slice(windowStart, end);

  const sentenceEnd = lastMatchEnd(SENTENCE_BREAK_PATTERN, window);
  if (sentenceEnd !== null) return windowStart + sentenceEnd;

  const spaceEnd = lastMatchEnd(WHITESPACE_PATTERN, window);
  if (spaceEnd !== null) return windowStart + spaceEnd;

  return end;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * True when offset `at` falls between the two halves of a surrogate pair.
 */
export function splitsSurrogatePair(text: string, at: number): boolean {
  return (
    at > 0 &&
    at < text.length &&
    isHighSurrogate(text.charCodeAt(at - 1)) &&
    isLowSurrogate(text.charCodeAt(at))
  );
}

/**
 * Move a cut back by one unit when it, or the start of the next chunk,
 * would split a surrogate pair. The overlap stays exact, so a start inside
 * a pair is only avoidable when the cut can move.
 */
function keepPairsWhole(text: string, cut: number, start: number, overlap: number): number {
  if (cut >= text.length) return cut;

  const candidates = [cut, cut - 1].filter((candidate) => candidate - overlap > start);
  const whole = candidates.find(
    (candidate) =>
      !splitsSurrogatePair(text, candidate) && !splitsSurrogatePair(text, candidate - overlap)
  );
  return whole ?? candidates.find((candidate) => !splitsSurrogatePair(text, candidate)) ?? cut;
}

/**
 * Split page text into overlapping chunks.
 *
 * @throws InvalidConfigurationError when chunkSize is not positive or
 *   overlap is not smaller than chunkSize
 */
export function chunkPages(
  pages: readonly PageText[],
  options: Partial<ChunkingOptions> = {}
): Chunk[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;
  validateChunkingOptions(chunkSize, overlap);

  const { text, spans } = concatenatePages(pages, options.pageSeparator ?? DEFAULT_PAGE_SEPARATOR);
  if (text.length === 0) return [];

  // A cut must land strictly after start + overlap or the window stalls
  const lookback = Math.min(
    options.boundaryLookback ?? DEFAULT_BOUNDARY_LOOKBACK,
    chunkSize - overlap - 1
  );

  const chunks: Chunk[] = [];
  let start = 0;

  while (start < text.length) {
    const cut = findCut(text, Math.min(start + chunkSize, text.length), lookback);
    const end = keepPairsWhole(text, cut, start, overlap);

    chunks.push({
      chunk_index: chunks.length,
      page_number: pageAtOffset(spans, start),
      text: text.slice(start, end),
      char_start: start,
      char_end: end,
    });

    if (end >= text.length) break;
    start = end - overlap;
  }

  return chunks;
}
