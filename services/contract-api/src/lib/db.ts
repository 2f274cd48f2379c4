/**
 * Database Queries
 *
 * PostgreSQL implementations of the repository and extraction cache.
 */

import { Pool } from 'pg';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  type AuditFindingResponse,
  type DocumentMetadata,
  type DocumentStatus,
  type ExtractedFields,
  type ExtractionCache,
} from '@contract-intel/shared';
import type { ContractRepository, NewDocument, StoredChunk } from './repository';

export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
});

interface DocumentRow {
  document_id: string;
  filename: string;
  file_size: number;
  num_pages: number | null;
  status: DocumentStatus;
  created_at: Date;
}

interface ChunkRow {
  document_id: string;
  chunk_index: number;
  page_number: number;
  text_content: string;
  char_start: number;
  char_end: number;
}

interface ExtractedDataRow {
  fields: ExtractedFields;
}

const DOCUMENT_COLUMNS = 'document_id, filename, file_size, num_pages, status, created_at';

function toDocumentMetadata(row: DocumentRow): DocumentMetadata {
  return {
    document_id: row.document_id,
    filename: row.filename,
    file_size: row.file_size,
    num_pages: row.num_pages,
    status: row.status,
    created_at: row.created_at.toISOString(),
  };
}

function toStoredChunk(row: ChunkRow): StoredChunk {
  return {
    document_id: row.document_id,
    chunk_index: row.chunk_index,
    page_number: row.page_number,
    text: row.text_content,
    char_start: row.char_start,
    char_end: row.char_end,
  };
}

async function timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  try {
    return await fn();
  } finally {
    dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
  }
}

export class PgContractRepository implements ContractRepository {
  constructor(private readonly db: Pool = pool) {}

  async createDocument(document: NewDocument): Promise<DocumentMetadata> {
    return timed('create_document', async () => {
      const result = await this.db.query<DocumentRow>(
        `INSERT INTO documents (document_id, filename, file_path, file_size, last_correlation_id)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${DOCUMENT_COLUMNS}`,
        [
          document.document_id,
          document.filename,
          document.file_path,
          document.file_size,
          document.correlation_id,
        ]
      );
      return toDocumentMetadata(result.rows[0]);
    });
  }

  async getDocument(documentId: string): Promise<DocumentMetadata | null> {
    return timed('get_document', async () => {
      const result = await this.db.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE document_id = $1`,
        [documentId]
      );
      return result.rows.length > 0 ? toDocumentMetadata(result.rows[0]) : null;
    });
  }

  async listDocuments(limit: number, offset: number): Promise<DocumentMetadata[]> {
    return timed('list_documents', async () => {
      const result = await this.db.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents
         ORDER BY created_at DESC, document_id
         LIMIT $1 OFFSET $2`,
        [limit, offset]
      );
      return result.rows.map(toDocumentMetadata);
    });
  }

  async markFailed(documentId: string): Promise<void> {
    await timed('mark_failed', async () => {
      await this.db.query(
        `UPDATE documents SET status = 'failed', updated_at = NOW() WHERE document_id = $1`,
        [documentId]
      );
    });
  }

  async getChunks(documentId: string): Promise<StoredChunk[]> {
    return this.findChunks([documentId]);
  }

  async findChunks(documentIds: readonly string[] | null): Promise<StoredChunk[]> {
    return timed('find_chunks', async () => {
      const columns = 'document_id, chunk_index, page_number, text_content, char_start, char_end';
      const result =
        documentIds === null
          ? await this.db.query<ChunkRow>(
              `SELECT ${columns} FROM document_chunks ORDER BY document_id, chunk_index`
            )
          : await this.db.query<ChunkRow>(
              `SELECT ${columns} FROM document_chunks
               WHERE document_id = ANY($1::text[])
               ORDER BY document_id, chunk_index`,
              [documentIds]
            );
      return result.rows.map(toStoredChunk);
    });
  }

  async replaceAuditFindings(
    documentId: string,
    findings: readonly AuditFindingResponse[]
  ): Promise<void> {
    await timed('replace_audit_findings', async () => {
      const client = await this.db.connect();
      try {
        await client.query('BEGIN');
        await client.query('DELETE FROM audit_findings WHERE document_id = $1', [documentId]);
        for (const finding of findings) {
          await client.query(
            `INSERT INTO audit_findings
               (document_id, finding_type, severity, description, evidence, page_number, char_start, char_end)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
            [
              documentId,
              finding.finding_type,
              finding.severity,
              finding.description,
              finding.evidence,
              finding.page_number,
              finding.char_start,
              finding.char_end,
            ]
          );
        }
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        logger.error('Failed to persist audit findings', error, { document_id: documentId });
        throw error;
      } finally {
        client.release();
      }
    });
  }
}

/**
 * Extraction cache backed by the extracted_data table.
 */
export class PgExtractionCache implements ExtractionCache {
  constructor(private readonly db: Pool = pool) {}

  async get(documentId: string): Promise<ExtractedFields | null> {
    return timed('get_extraction', async () => {
      const result = await this.db.query<ExtractedDataRow>(
        'SELECT fields FROM extracted_data WHERE document_id = $1',
        [documentId]
      );
      return result.rows.length > 0 ? result.rows[0].fields : null;
    });
  }

  async set(documentId: string, fields: ExtractedFields): Promise<void> {
    await timed('set_extraction', async () => {
      await this.db.query(
        `INSERT INTO extracted_data (document_id, fields, extraction_method, confidence_score)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (document_id) DO UPDATE SET
           fields = EXCLUDED.fields,
           extraction_method = EXCLUDED.extraction_method,
           confidence_score = EXCLUDED.confidence_score,
           updated_at = NOW()`,
        [documentId, JSON.stringify(fields), fields.extraction_method, fields.confidence_score]
      );
    });
  }
}
