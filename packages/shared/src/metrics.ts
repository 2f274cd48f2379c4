/**
 * Prometheus Metrics
 *
 * Metrics for HTTP traffic, ingestion jobs, chunking and extraction.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'contract_intel_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const jobDurationHistogram = new promClient.Histogram({
  name: 'contract_intel_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'contract_intel_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsIngestedCounter = new promClient.Counter({
  name: 'contract_intel_documents_ingested_total',
  help: 'Total number of documents decoded and chunked',
  labelNames: ['status'],
  registers: [register],
});

export const chunksProducedCounter = new promClient.Counter({
  name: 'contract_intel_chunks_produced_total',
  help: 'Total number of chunks produced by the chunker',
  registers: [register],
});

export const extractionsCounter = new promClient.Counter({
  name: 'contract_intel_extractions_total',
  help: 'Field extractions served, by method and cache outcome',
  labelNames: ['extraction_method', 'cache'],
  registers: [register],
});

export const extractionConfidenceHistogram = new promClient.Histogram({
  name: 'contract_intel_extraction_confidence',
  help: 'Confidence score of fresh extractions',
  labelNames: ['extraction_method'],
  buckets: [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1],
  registers: [register],
});

export const auditFindingsCounter = new promClient.Counter({
  name: 'contract_intel_audit_findings_total',
  help: 'Audit findings raised, by severity',
  labelNames: ['severity'],
  registers: [register],
});

export const backpressureRejectionsCounter = new promClient.Counter({
  name: 'contract_intel_backpressure_rejections_total',
  help: 'Total number of requests rejected due to backpressure',
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'contract_intel_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'contract_intel_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'contract_intel_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Report queue depths to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      queueDepthGauge.set({ queue: name }, m.waiting + m.active);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Uses Node built-in http - no express required.
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Failed to render metrics', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
