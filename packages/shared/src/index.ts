/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, formatLog, type LogContext, type LogLevel } from './logger';

// Configuration
export { config, loadConfig, resolveChunkingOptions, type Config } from './config';

// Errors
export {
  ContractIntelError,
  InvalidConfigurationError,
  DocumentNotFoundError,
  NoTextAvailableError,
  InvalidRequestError,
  UnsupportedExtractionMethodError,
  isContractIntelError,
  type ErrorCode,
} from './errors';

// Types
export * from './types';

// Chunking
export * from './chunking';

// Extractors
export * from './extractors';

// Audit
export * from './audit';

// Search
export { searchChunks, queryTerms, DEFAULT_TOP_K, type ScoredChunk } from './search/keyword-search';

// Cache
export { InMemoryExtractionCache, type ExtractionCache } from './cache/extraction-cache';

// Queues
export {
  QUEUE_NAMES,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type QueueName,
  type IngestDocumentJob,
  type WorkerOptions,
  type BackpressureStatus,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsIngestedCounter,
  chunksProducedCounter,
  extractionsCounter,
  extractionConfidenceHistogram,
  auditFindingsCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateExtractResponse, type ValidationResult } from './schemas';
