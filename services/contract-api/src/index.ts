/**
 * Contract API
 *
 * Upload, extraction, audit and search endpoints over ingested contracts.
 */

import express, { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  reportQueueMetrics,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  checkBackpressure,
  createQueue,
  getExtractorOrThrow,
  isContractIntelError,
  validateExtractResponse,
  QUEUE_NAMES,
  type ErrorEnvelope,
  type IngestDocumentJob,
} from '@contract-intel/shared';
import { ContractService } from './lib/contracts';
import { PgContractRepository, PgExtractionCache, pool } from './lib/db';
import {
  httpStatusFor,
  parseDocumentId,
  parsePagination,
  parseSearchRequest,
} from './lib/requests';
import { FileUploadStore } from './lib/uploads';

const app = express();

/** Most files accepted in one multipart upload */
const MAX_BATCH_FILES = 20;

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: config.maxUploadBytes,
    files: MAX_BATCH_FILES,
  },
});

const ingestQueue = createQueue<IngestDocumentJob, void>(QUEUE_NAMES.INGEST_DOCUMENT);

const service = new ContractService({
  repository: new PgContractRepository(),
  cache: new PgExtractionCache(),
  extractor: getExtractorOrThrow('rule-based'),
  uploads: new FileUploadStore(config.uploadDir),
  publisher: {
    async publish(job) {
      await ingestQueue.add(QUEUE_NAMES.INGEST_DOCUMENT, job, {
        jobId: `ingest_${job.document_id}`,
      });
    },
  },
  maxUploadBytes: config.maxUploadBytes,
});

// Body parsers run before the context middleware so handlers keep the context
app.use(express.json());
app.use(express.raw({ type: 'application/pdf', limit: config.maxUploadBytes }));
// multipart/form-data uploads under the "files" field; other requests pass through
app.use('/ingest', upload.array('files', MAX_BATCH_FILES));

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const correlationId = req.get('x-correlation-id') || ulid();
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
});

// Request timing middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const routePath: unknown = req.route?.path;
    const path = typeof routePath === 'string' ? routePath : req.path;

    httpRequestDurationHistogram.observe(
      { method: req.method, path, status: res.statusCode.toString() },
      duration
    );
    httpRequestsCounter.inc({
      method: req.method,
      path,
      status: res.statusCode.toString(),
    });

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
});

function errorEnvelope(code: string, message: string): ErrorEnvelope {
  return {
    error: {
      code,
      message,
      correlation_id: getCorrelationId(),
    },
  };
}

/**
 * Map known errors to their status; anything else is a logged 500.
 */
function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  if (isContractIntelError(error)) {
    res.status(httpStatusFor(error.code)).json(errorEnvelope(error.code, error.message));
    return;
  }

  logger.error(fallbackMessage, error);
  res.status(500).json(errorEnvelope('internal_error', fallbackMessage));
}

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    await pool.query('SELECT 1');

    res.json({
      status: 'healthy',
      service: 'contract-api',
      database: 'connected',
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'contract-api',
      database: 'disconnected',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  await reportQueueMetrics([{ name: QUEUE_NAMES.INGEST_DOCUMENT, queue: ingestQueue }]);
  res.setHeader('Content-Type', getMetricsContentType());
  res.send(await getMetrics());
});

/**
 * POST /ingest
 * Either a raw application/pdf body with the original filename in
 * X-Filename, or a multipart form with one or more "files"
 */
app.post('/ingest', async (req: Request, res: Response) => {
  try {
    const backpressure = await checkBackpressure(ingestQueue);

    if (backpressure.shouldReject) {
      backpressureRejectionsCounter.inc();
      logger.warn('Request rejected due to backpressure', {
        queue_depth: backpressure.depth,
      });
      res
        .status(503)
        .json(errorEnvelope('service_unavailable', 'System is under heavy load. Please retry later.'));
      return;
    }

    if (backpressure.shouldWarn) {
      logger.warn('Queue depth approaching threshold', {
        queue_depth: backpressure.depth,
      });
    }

    const files = req.files;
    if (Array.isArray(files)) {
      const batch = await service.ingestMany(
        files.map((file) => ({ filename: file.originalname, content: file.buffer }))
      );
      res.status(202).json(batch);
      return;
    }

    const body: unknown = req.body;
    const content = Buffer.isBuffer(body) ? body : Buffer.alloc(0);
    const result = await service.ingest({ filename: req.get('x-filename'), content });

    res.status(202).json(result);
  } catch (error) {
    sendError(res, error, 'Failed to ingest document');
  }
});

/**
 * GET /documents
 * Paginated document metadata, newest first
 */
app.get('/documents', async (req: Request, res: Response) => {
  try {
    const { limit, offset } = parsePagination(req.query);
    const documents = await service.listDocuments(limit, offset);
    res.json({ items: documents, limit, offset });
  } catch (error) {
    sendError(res, error, 'Failed to list documents');
  }
});

/**
 * GET /documents/:document_id
 */
app.get('/documents/:document_id', async (req: Request, res: Response) => {
  try {
    res.json(await service.getDocument(req.params.document_id));
  } catch (error) {
    sendError(res, error, 'Failed to retrieve document');
  }
});

/**
 * POST /extract
 * Returns the cached extraction or runs the rule-based extractor
 */
app.post('/extract', async (req: Request, res: Response) => {
  try {
    const documentId = parseDocumentId(req.body);
    const response = await service.extract(documentId);

    validateExtractResponse(response);

    res.json(response);
  } catch (error) {
    sendError(res, error, 'Failed to extract contract fields');
  }
});

/**
 * POST /audit
 * Risk findings with page numbers, persisted per document
 */
app.post('/audit', async (req: Request, res: Response) => {
  try {
    const documentId = parseDocumentId(req.body);
    res.json(await service.audit(documentId));
  } catch (error) {
    sendError(res, error, 'Failed to audit contract');
  }
});

/**
 * POST /search
 * Keyword search across document chunks
 */
app.post('/search', async (req: Request, res: Response) => {
  try {
    const { query, document_ids, max_results } = parseSearchRequest(req.body);
    res.json(await service.search(query, document_ids, max_results));
  } catch (error) {
    sendError(res, error, 'Failed to search documents');
  }
});

// Body parser failures (oversized or malformed bodies)
app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof multer.MulterError) {
    const message = err.field ? `${err.field}: ${err.message}` : err.message;
    res.status(400).json(errorEnvelope('invalid_request', message));
    return;
  }
  const status =
    typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
      ? err.status
      : 500;
  const message = err instanceof Error ? err.message : 'Request failed';
  if (status >= 500) {
    logger.error('Unhandled request error', err);
  }
  res
    .status(status)
    .json(errorEnvelope(status >= 500 ? 'internal_error' : 'invalid_request', message));
});

// Start server
app.listen(config.port, () => {
  logger.info('Contract API started', { port: config.port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await ingestQueue.close();
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
