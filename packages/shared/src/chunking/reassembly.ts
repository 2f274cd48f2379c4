/**
 * Chunk Reassembly
 *
 * Inverse of chunkPages: stitches stored chunks back into the document
 * text, dropping the prefix each chunk shares with its predecessor.
 */

import type { Chunk } from '../types';

export function reassembleText(chunks: readonly Chunk[]): string {
  const ordered = [...chunks].sort((a, b) => a.chunk_index - b.chunk_index);

  let text = '';
  let coveredTo = 0;

  for (const chunk of ordered) {
    if (chunk.char_end <= coveredTo) continue;
    const skip = Math.max(0, coveredTo - chunk.char_start);
    text += chunk.text.slice(skip);
    coveredTo = chunk.char_end;
  }

  return text;
}

/**
 * Page of the first chunk (in index order) whose range contains the offset.
 */
export function pageForOffset(chunks: readonly Chunk[], offset: number): number | null {
  const ordered = [...chunks].sort((a, b) => a.chunk_index - b.chunk_index);
  const owner = ordered.find((chunk) => chunk.char_start <= offset && offset < chunk.char_end);
  return owner ? owner.page_number : null;
}
