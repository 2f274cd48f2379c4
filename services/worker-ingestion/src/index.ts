/**
 * Ingestion Worker
 *
 * Consumes the ingest_document queue: decodes the uploaded PDF, chunks its
 * text and stores the chunks.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  serveMetrics,
  resolveChunkingOptions,
  validateChunkingOptions,
  QUEUE_NAMES,
  type IngestDocumentJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@contract-intel/shared';
import { PgChunkStore, pool } from './lib/db';
import { handleIngestFailure, ingestDocument, isFinalAttempt, type IngestResult } from './lib/ingest';
import { extractTextFromPdf } from './lib/pdf';

const store = new PgChunkStore();

// Invalid chunking configuration stops the worker before it takes any job
const chunking = resolveChunkingOptions(config);
validateChunkingOptions(chunking.chunkSize, chunking.overlap);

/**
 * Process ingest_document job
 */
async function processIngestDocument(
  job: Job<IngestDocumentJob, IngestResult>
): Promise<IngestResult> {
  const { correlation_id, document_id, filename } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, documentId: document_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing ingest_document', {
      jobId: job.id,
      document_id,
      filename,
      attempt: job.attemptsMade + 1,
    });

    try {
      const result = await ingestDocument(job.data, {
        decode: extractTextFromPdf,
        store,
        chunking,
      });

      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.INGEST_DOCUMENT, status: 'success' });
      jobDurationHistogram.observe({ queue: QUEUE_NAMES.INGEST_DOCUMENT, status: 'success' }, duration);

      return result;
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.INGEST_DOCUMENT, status: 'failed' });
      return handleIngestFailure(
        job.data,
        error,
        isFinalAttempt(job.attemptsMade, job.opts.attempts),
        store
      );
    }
  });
}

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.workerMetricsPort);

// Create and start the worker
const worker = createWorker<IngestDocumentJob, IngestResult>(
  QUEUE_NAMES.INGEST_DOCUMENT,
  processIngestDocument
);

logger.info('Ingestion worker started', {
  chunk_size: chunking.chunkSize,
  chunk_overlap: chunking.overlap,
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await pool.end();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
