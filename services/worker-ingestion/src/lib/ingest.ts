/**
 * Document Ingestion
 *
 * Decode an uploaded PDF into page text, chunk it and store the chunks.
 */

import {
  logger,
  chunkPages,
  chunksProducedCounter,
  documentsIngestedCounter,
  type Chunk,
  type ChunkingOptions,
  type IngestDocumentJob,
  type PageText,
} from '@contract-intel/shared';

export interface DecodedDocument {
  pages: PageText[];
  totalPages: number;
}

export interface ChunkStore {
  saveChunks(documentId: string, chunks: readonly Chunk[], numPages: number): Promise<void>;
  markFailed(documentId: string): Promise<void>;
}

export interface IngestDeps {
  decode: (filePath: string) => Promise<DecodedDocument>;
  store: ChunkStore;
  chunking: ChunkingOptions;
}

export interface IngestResult {
  num_pages: number;
  num_chunks: number;
}

export async function ingestDocument(job: IngestDocumentJob, deps: IngestDeps): Promise<IngestResult> {
  const decoded = await deps.decode(job.file_path);
  const chunks = chunkPages(decoded.pages, deps.chunking);

  if (chunks.length === 0) {
    logger.warn('No extractable text in document', {
      document_id: job.document_id,
      filename: job.filename,
      total_pages: decoded.totalPages,
    });
  }

  await deps.store.saveChunks(job.document_id, chunks, decoded.totalPages);

  chunksProducedCounter.inc(chunks.length);
  documentsIngestedCounter.inc({ status: 'ready' });
  logger.info('Document chunked', {
    document_id: job.document_id,
    num_pages: decoded.totalPages,
    num_chunks: chunks.length,
  });

  return { num_pages: decoded.totalPages, num_chunks: chunks.length };
}

/**
 * attemptsMade counts attempts finished before the current one.
 */
export function isFinalAttempt(attemptsMade: number, maxAttempts: number | undefined): boolean {
  return attemptsMade + 1 >= (maxAttempts ?? 1);
}

/**
 * Mark the document failed once no retry remains, then rethrow so the
 * queue records the failure.
 */
export async function handleIngestFailure(
  job: IngestDocumentJob,
  error: unknown,
  finalAttempt: boolean,
  store: ChunkStore
): Promise<never> {
  if (finalAttempt) {
    documentsIngestedCounter.inc({ status: 'failed' });
    logger.error('Ingestion failed permanently', error, { document_id: job.document_id });
    await store.markFailed(job.document_id);
  } else {
    logger.warn('Ingestion attempt failed, will retry', {
      document_id: job.document_id,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  throw error;
}
