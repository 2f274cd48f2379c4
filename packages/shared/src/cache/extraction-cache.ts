/**
 * Extraction Cache Contract
 *
 * Maps a document ID to the last ExtractedFields computed for it. Entries
 * are never invalidated automatically: re-ingesting or editing the source
 * document leaves the old record in place until something calls set()
 * again.
 */

import type { ExtractedFields } from '../types';

export interface ExtractionCache {
  get(documentId: string): Promise<ExtractedFields | null>;
  set(documentId: string, fields: ExtractedFields): Promise<void>;
}

export class InMemoryExtractionCache implements ExtractionCache {
  private readonly entries = new Map<string, ExtractedFields>();

  async get(documentId: string): Promise<ExtractedFields | null> {
    return this.entries.get(documentId) ?? null;
  }

  async set(documentId: string, fields: ExtractedFields): Promise<void> {
    this.entries.set(documentId, fields);
  }

  get size(): number {
    return this.entries.size;
  }
}
