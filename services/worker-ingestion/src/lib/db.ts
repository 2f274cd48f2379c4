/**
 * Database Operations
 *
 * Chunk persistence and document status updates for the ingestion worker.
 */

import { Pool } from 'pg';
import { logger, config, dbQueryDurationHistogram, type Chunk } from '@contract-intel/shared';
import type { ChunkStore } from './ingest';

export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
});

export class PgChunkStore implements ChunkStore {
  constructor(private readonly db: Pool = pool) {}

  /**
   * Replace the document's chunks and mark it ready, in one transaction.
   */
  async saveChunks(documentId: string, chunks: readonly Chunk[], numPages: number): Promise<void> {
    const startTime = Date.now();
    const client = await this.db.connect();

    try {
      await client.query('BEGIN');
      await client.query('DELETE FROM document_chunks WHERE document_id = $1', [documentId]);

      for (const chunk of chunks) {
        await client.query(
          `INSERT INTO document_chunks
             (document_id, chunk_index, page_number, text_content, char_start, char_end)
           VALUES ($1, $2, $3, $4, $5, $6)`,
          [documentId, chunk.chunk_index, chunk.page_number, chunk.text, chunk.char_start, chunk.char_end]
        );
      }

      await client.query(
        `UPDATE documents SET num_pages = $2, status = 'ready', updated_at = NOW()
         WHERE document_id = $1`,
        [documentId, numPages]
      );
      await client.query('COMMIT');

      dbQueryDurationHistogram.observe({ operation: 'save_chunks' }, (Date.now() - startTime) / 1000);
    } catch (error) {
      await client.query('ROLLBACK');
      logger.error('Failed to save chunks', error, { document_id: documentId });
      throw error;
    } finally {
      client.release();
    }
  }

  async markFailed(documentId: string): Promise<void> {
    await this.db.query(
      `UPDATE documents SET status = 'failed', updated_at = NOW() WHERE document_id = $1`,
      [documentId]
    );
  }
}
