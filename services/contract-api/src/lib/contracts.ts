/**
 * Contract Service
 *
 * Document lookup, cached field extraction, risk audit and keyword search
 * over stored chunks. Storage, cache and queue are injected.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  logger,
  auditContract,
  auditFindingsCounter,
  documentsIngestedCounter,
  extractionConfidenceHistogram,
  extractionsCounter,
  getCorrelationId,
  pageForOffset,
  reassembleText,
  searchChunks,
  DocumentNotFoundError,
  InvalidRequestError,
  NoTextAvailableError,
  type AuditResponse,
  type BatchIngestResponse,
  type ContractFieldExtractor,
  type DocumentMetadata,
  type ExtractedFields,
  type ExtractionCache,
  type ExtractResponse,
  type IngestResponse,
  type SearchResponse,
} from '@contract-intel/shared';
import type { ContractRepository, IngestPublisher, StoredChunk, UploadStore } from './repository';
import { storedFilename, validateUpload } from './uploads';

export const MAX_EXCERPT_LENGTH = 300;

export interface ContractServiceDeps {
  repository: ContractRepository;
  cache: ExtractionCache;
  extractor: ContractFieldExtractor;
  uploads: UploadStore;
  publisher: IngestPublisher;
  maxUploadBytes: number;
  now?: () => Date;
}

export interface UploadInput {
  filename: string | undefined;
  content: Buffer;
}

export class ContractService {
  private readonly deps: ContractServiceDeps;
  private readonly now: () => Date;

  constructor(deps: ContractServiceDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Store the upload, record a pending document and queue it for ingestion.
   */
  async ingest(upload: UploadInput): Promise<IngestResponse> {
    const filename = validateUpload(upload.filename, upload.content, this.deps.maxUploadBytes);
    const correlationId = getCorrelationId();
    const documentId = uuidv4();
    const uploadedAt = this.now();

    const filePath = await this.deps.uploads.save(
      storedFilename(filename, uploadedAt),
      upload.content
    );

    let document: DocumentMetadata;
    try {
      document = await this.deps.repository.createDocument({
        document_id: documentId,
        filename,
        file_path: filePath,
        file_size: upload.content.length,
        correlation_id: correlationId,
      });
    } catch (error) {
      await this.discardUpload(documentId, filePath, false);
      throw error;
    }

    try {
      await this.deps.publisher.publish({
        event_type: 'document.uploaded',
        correlation_id: correlationId,
        document_id: documentId,
        file_path: filePath,
        filename,
        uploaded_at: uploadedAt.toISOString(),
      });
    } catch (error) {
      logger.error('Failed to queue document for ingestion', error, { document_id: documentId });
      await this.discardUpload(documentId, filePath, true);
      throw error;
    }

    documentsIngestedCounter.inc({ status: 'accepted' });
    logger.info('Document accepted for ingestion', {
      document_id: documentId,
      filename,
      file_size: upload.content.length,
    });

    return { document_id: document.document_id, status: document.status, correlation_id: correlationId };
  }

  /**
   * Ingest each file in turn. Files rejected by validation are reported in
   * `errors`; the request only fails when no file was accepted.
   */
  async ingestMany(uploads: readonly UploadInput[]): Promise<BatchIngestResponse> {
    if (uploads.length === 0) {
      throw new InvalidRequestError('No files provided');
    }

    const documentIds: string[] = [];
    const errors: string[] = [];

    for (const upload of uploads) {
      try {
        const result = await this.ingest(upload);
        documentIds.push(result.document_id);
      } catch (error) {
        if (!(error instanceof InvalidRequestError)) throw error;
        errors.push(error.message);
      }
    }

    if (documentIds.length === 0) {
      throw new InvalidRequestError(`Failed to ingest any documents. Errors: ${errors.join('; ')}`);
    }

    let message = `Successfully ingested ${documentIds.length} document(s)`;
    if (errors.length > 0) {
      message += `. Errors: ${errors.join('; ')}`;
      logger.warn('Some files were rejected', { rejected: errors.length, accepted: documentIds.length });
    }

    return {
      document_ids: documentIds,
      total_documents: documentIds.length,
      message,
      errors,
      correlation_id: getCorrelationId(),
    };
  }

  async listDocuments(limit: number, offset: number): Promise<DocumentMetadata[]> {
    return this.deps.repository.listDocuments(limit, offset);
  }

  async getDocument(documentId: string): Promise<DocumentMetadata> {
    const document = await this.deps.repository.getDocument(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }
    return document;
  }

  /**
   * Cached record if present, otherwise extract from the reassembled text
   * and cache the result.
   */
  async extract(documentId: string): Promise<ExtractResponse> {
    await this.getDocument(documentId);
    const fields = await this.cachedOrFreshFields(documentId, () => this.loadChunks(documentId));
    return { document_id: documentId, ...fields };
  }

  async audit(documentId: string): Promise<AuditResponse> {
    await this.getDocument(documentId);
    const chunks = await this.loadChunks(documentId);
    const fields = await this.cachedOrFreshFields(documentId, async () => chunks);

    const report = auditContract(reassembleText(chunks), fields);
    const findings = report.findings.map((finding) => ({
      ...finding,
      page_number: finding.char_start === null ? null : pageForOffset(chunks, finding.char_start),
    }));

    await this.deps.repository.replaceAuditFindings(documentId, findings);

    for (const finding of findings) {
      auditFindingsCounter.inc({ severity: finding.severity });
    }
    logger.info('Audit complete', {
      document_id: documentId,
      total_findings: findings.length,
      risk_score: report.risk_score,
    });

    return {
      document_id: documentId,
      findings,
      total_findings: findings.length,
      risk_score: report.risk_score,
      summary: report.summary,
    };
  }

  /**
   * Keyword search over the chunks of the given documents, or of all
   * documents.
   */
  async search(
    query: string,
    documentIds: readonly string[] | null,
    maxResults: number
  ): Promise<SearchResponse> {
    const chunks = await this.deps.repository.findChunks(documentIds);
    const scored = searchChunks(query, chunks, maxResults);

    return {
      query,
      results: scored.map(({ chunk, relevance_score }) => ({
        document_id: chunk.document_id,
        page_number: chunk.page_number,
        char_start: chunk.char_start,
        char_end: chunk.char_end,
        text_excerpt: chunk.text.slice(0, MAX_EXCERPT_LENGTH),
        relevance_score,
      })),
    };
  }

  /**
   * Undo a partly accepted upload. Cleanup failures are logged so the
   * caller still sees the original error.
   */
  private async discardUpload(documentId: string, filePath: string, recorded: boolean): Promise<void> {
    documentsIngestedCounter.inc({ status: 'failed' });
    const steps: Promise<void>[] = [this.deps.uploads.remove(filePath)];
    if (recorded) {
      steps.push(this.deps.repository.markFailed(documentId));
    }

    for (const outcome of await Promise.allSettled(steps)) {
      if (outcome.status === 'rejected') {
        logger.error('Failed to clean up rejected upload', outcome.reason, {
          document_id: documentId,
          file_path: filePath,
        });
      }
    }
  }

  private async loadChunks(documentId: string): Promise<StoredChunk[]> {
    const chunks = await this.deps.repository.getChunks(documentId);
    if (chunks.length === 0) {
      throw new NoTextAvailableError(documentId);
    }
    return chunks;
  }

  private async cachedOrFreshFields(
    documentId: string,
    chunks: () => Promise<StoredChunk[]>
  ): Promise<ExtractedFields> {
    const cached = await this.deps.cache.get(documentId);
    if (cached) {
      extractionsCounter.inc({ extraction_method: cached.extraction_method, cache: 'hit' });
      logger.debug('Extraction cache hit', { document_id: documentId });
      return cached;
    }

    const text = reassembleText(await chunks());
    const fields = this.deps.extractor.extract(text);
    await this.deps.cache.set(documentId, fields);

    extractionsCounter.inc({ extraction_method: fields.extraction_method, cache: 'miss' });
    extractionConfidenceHistogram.observe(
      { extraction_method: fields.extraction_method },
      fields.confidence_score
    );
    logger.info('Extracted contract fields', {
      document_id: documentId,
      extraction_method: fields.extraction_method,
      confidence_score: fields.confidence_score,
    });

    return fields;
  }
}
