/**
 * Repository Contracts
 *
 * Storage seams for the API. The PostgreSQL implementation lives in db.ts;
 * tests supply in-memory ones.
 */

import type {
  AuditFindingResponse,
  Chunk,
  DocumentMetadata,
  IngestDocumentJob,
} from '@contract-intel/shared';

export interface StoredChunk extends Chunk {
  document_id: string;
}

export interface NewDocument {
  document_id: string;
  filename: string;
  file_path: string;
  file_size: number;
  correlation_id: string;
}

export interface ContractRepository {
  createDocument(document: NewDocument): Promise<DocumentMetadata>;
  getDocument(documentId: string): Promise<DocumentMetadata | null>;
  listDocuments(limit: number, offset: number): Promise<DocumentMetadata[]>;
  markFailed(documentId: string): Promise<void>;
  /** Chunks of one document in chunk_index order */
  getChunks(documentId: string): Promise<StoredChunk[]>;
  /** Chunks of the given documents, or of every document when null */
  findChunks(documentIds: readonly string[] | null): Promise<StoredChunk[]>;
  replaceAuditFindings(documentId: string, findings: readonly AuditFindingResponse[]): Promise<void>;
}

/**
 * Hands an uploaded document to the ingestion worker.
 */
export interface IngestPublisher {
  publish(job: IngestDocumentJob): Promise<void>;
}

/**
 * Writes uploaded bytes somewhere the worker can read them back.
 */
export interface UploadStore {
  save(storedName: string, content: Buffer): Promise<string>;
  remove(filePath: string): Promise<void>;
}
