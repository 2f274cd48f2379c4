/**
 * Contract service tests against in-memory storage
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  chunkPages,
  runWithContextAsync,
  ruleBasedExtractor,
  InMemoryExtractionCache,
  DocumentNotFoundError,
  NoTextAvailableError,
  InvalidRequestError,
  type AuditFindingResponse,
  type ContractFieldExtractor,
  type DocumentMetadata,
  type IngestDocumentJob,
  type PageText,
} from '@contract-intel/shared';
import { ContractService } from '../../services/contract-api/src/lib/contracts';
import type {
  ContractRepository,
  NewDocument,
  StoredChunk,
} from '../../services/contract-api/src/lib/repository';

const AGREEMENT = fs.readFileSync(
  path.join(__dirname, '../fixtures/services-agreement.txt'),
  'utf-8'
);

class InMemoryContractRepository implements ContractRepository {
  readonly documents = new Map<string, DocumentMetadata>();
  readonly chunks = new Map<string, StoredChunk[]>();
  readonly findings = new Map<string, AuditFindingResponse[]>();

  async createDocument(document: NewDocument): Promise<DocumentMetadata> {
    const metadata: DocumentMetadata = {
      document_id: document.document_id,
      filename: document.filename,
      file_size: document.file_size,
      num_pages: null,
      status: 'pending',
      created_at: '2024-03-15T09:05:07.000Z',
    };
    this.documents.set(document.document_id, metadata);
    return metadata;
  }

  async getDocument(documentId: string): Promise<DocumentMetadata | null> {
    return this.documents.get(documentId) ?? null;
  }

  async listDocuments(limit: number, offset: number): Promise<DocumentMetadata[]> {
    return [...this.documents.values()].slice(offset, offset + limit);
  }

  async markFailed(documentId: string): Promise<void> {
    const document = this.documents.get(documentId);
    if (document) {
      this.documents.set(documentId, { ...document, status: 'failed' });
    }
  }

  async getChunks(documentId: string): Promise<StoredChunk[]> {
    return this.chunks.get(documentId) ?? [];
  }

  async findChunks(documentIds: readonly string[] | null): Promise<StoredChunk[]> {
    const ids = documentIds ?? [...this.chunks.keys()];
    return ids.flatMap((id) => this.chunks.get(id) ?? []);
  }

  async replaceAuditFindings(
    documentId: string,
    findings: readonly AuditFindingResponse[]
  ): Promise<void> {
    this.findings.set(documentId, [...findings]);
  }

  addReadyDocument(documentId: string, pages: PageText[], chunkSize: number, overlap: number): void {
    this.documents.set(documentId, {
      document_id: documentId,
      filename: `${documentId}.pdf`,
      file_size: 1024,
      num_pages: pages.length,
      status: 'ready',
      created_at: '2024-03-15T09:05:07.000Z',
    });
    this.chunks.set(
      documentId,
      chunkPages(pages, { chunkSize, overlap }).map((chunk) => ({ ...chunk, document_id: documentId }))
    );
  }
}

function setup(publish: (job: IngestDocumentJob) => Promise<void> = async () => undefined) {
  const repository = new InMemoryContractRepository();
  const cache = new InMemoryExtractionCache();
  const extract = jest.fn((text: string) => ruleBasedExtractor.extract(text));
  const extractor: ContractFieldExtractor = {
    method: 'rule-based',
    description: 'Counting wrapper',
    extract,
  };
  const saved: Array<{ storedName: string; size: number }> = [];
  const published: IngestDocumentJob[] = [];
  const removed: string[] = [];

  const service = new ContractService({
    repository,
    cache,
    extractor,
    uploads: {
      async save(storedName, content) {
        saved.push({ storedName, size: content.length });
        return `/uploads/${storedName}`;
      },
      async remove(filePath) {
        removed.push(filePath);
      },
    },
    publisher: {
      async publish(job) {
        await publish(job);
        published.push(job);
      },
    },
    maxUploadBytes: 1024,
    now: () => new Date(2024, 2, 15, 9, 5, 7),
  });

  return { service, repository, cache, extract, saved, published, removed };
}

const SPLIT = AGREEMENT.indexOf('4. Indemnification.');
const AGREEMENT_PAGES: PageText[] = [
  { pageNumber: 1, text: AGREEMENT.slice(0, SPLIT).trimEnd() },
  { pageNumber: 2, text: AGREEMENT.slice(SPLIT) },
];

describe('ContractService', () => {
  describe('ingest', () => {
    it('should store the upload, record the document and publish a job', async () => {
      const { service, repository, saved, published } = setup();
      const content = Buffer.from('%PDF-1.4 test document');

      const response = await runWithContextAsync({ correlationId: 'test-correlation-id' }, () =>
        service.ingest({ filename: 'My Contract (final).pdf', content })
      );

      expect(response.status).toBe('pending');
      expect(response.correlation_id).toBe('test-correlation-id');
      expect(saved).toEqual([{ storedName: '20240315_090507_My_Contract_final.pdf', size: content.length }]);
      expect(repository.documents.get(response.document_id)).toMatchObject({
        filename: 'My Contract (final).pdf',
        file_size: content.length,
        status: 'pending',
      });
      expect(published).toEqual([
        {
          event_type: 'document.uploaded',
          correlation_id: 'test-correlation-id',
          document_id: response.document_id,
          file_path: '/uploads/20240315_090507_My_Contract_final.pdf',
          filename: 'My Contract (final).pdf',
          uploaded_at: new Date(2024, 2, 15, 9, 5, 7).toISOString(),
        },
      ]);
    });

    it('should reject a non-PDF before storing anything', async () => {
      const { service, saved, published } = setup();

      await expect(
        service.ingest({ filename: 'notes.txt', content: Buffer.from('hello') })
      ).rejects.toThrow(InvalidRequestError);
      expect(saved).toEqual([]);
      expect(published).toEqual([]);
    });
  });

  describe('ingestMany', () => {
    it('should accept valid files and report the rejected ones', async () => {
      const { service, repository, published } = setup();

      const response = await runWithContextAsync({ correlationId: 'batch-correlation-id' }, () =>
        service.ingestMany([
          { filename: 'good.pdf', content: Buffer.from('%PDF-1.4 good') },
          { filename: 'notes.txt', content: Buffer.from('plain text') },
        ])
      );

      expect(response.total_documents).toBe(1);
      expect(response.document_ids).toEqual([published[0].document_id]);
      expect(response.errors).toEqual(['notes.txt: Not a PDF file']);
      expect(response.message).toBe(
        'Successfully ingested 1 document(s). Errors: notes.txt: Not a PDF file'
      );
      expect(response.correlation_id).toBe('batch-correlation-id');
      expect(repository.documents.size).toBe(1);
    });

    it('should fail when no file is accepted', async () => {
      const { service } = setup();

      await expect(
        service.ingestMany([
          { filename: 'a.txt', content: Buffer.from('x') },
          { filename: 'empty.pdf', content: Buffer.alloc(0) },
        ])
      ).rejects.toThrow('Failed to ingest any documents. Errors: a.txt: Not a PDF file; empty.pdf: Empty file');
    });

    it('should require at least one file', async () => {
      const { service } = setup();
      await expect(service.ingestMany([])).rejects.toThrow('No files provided');
    });

    it('should propagate a queue failure instead of reporting it per file', async () => {
      const { service } = setup(async () => {
        throw new Error('queue unavailable');
      });

      await expect(
        service.ingestMany([{ filename: 'good.pdf', content: Buffer.from('%PDF-1.4 good') }])
      ).rejects.toThrow('queue unavailable');
    });
  });

  describe('ingest failures', () => {
    it('should mark the document failed and remove the file when queueing fails', async () => {
      const { service, repository, removed } = setup(async () => {
        throw new Error('queue unavailable');
      });

      await expect(
        service.ingest({ filename: 'contract.pdf', content: Buffer.from('%PDF-1.4 test') })
      ).rejects.toThrow('queue unavailable');

      const [document] = [...repository.documents.values()];
      expect(document.status).toBe('failed');
      expect(removed).toEqual(['/uploads/20240315_090507_contract.pdf']);
    });

    it('should remove the file when the document cannot be recorded', async () => {
      const { service, repository, removed, published } = setup();
      jest.spyOn(repository, 'createDocument').mockRejectedValue(new Error('database unavailable'));

      await expect(
        service.ingest({ filename: 'contract.pdf', content: Buffer.from('%PDF-1.4 test') })
      ).rejects.toThrow('database unavailable');

      expect(removed).toEqual(['/uploads/20240315_090507_contract.pdf']);
      expect(published).toEqual([]);
    });
  });

  describe('documents', () => {
    it('should return metadata for a known document', async () => {
      const { service, repository } = setup();
      repository.addReadyDocument('doc-1', AGREEMENT_PAGES, 200, 40);

      await expect(service.getDocument('doc-1')).resolves.toMatchObject({
        document_id: 'doc-1',
        num_pages: 2,
        status: 'ready',
      });
    });

    it('should raise not_found for an unknown document', async () => {
      const { service } = setup();
      await expect(service.getDocument('missing')).rejects.toThrow('Document with ID missing not found');
    });

    it('should page through documents', async () => {
      const { service, repository } = setup();
      for (const id of ['doc-1', 'doc-2', 'doc-3']) {
        repository.addReadyDocument(id, [{ pageNumber: 1, text: 'Text.' }], 100, 10);
      }

      const page = await service.listDocuments(2, 1);
      expect(page.map((d) => d.document_id)).toEqual(['doc-2', 'doc-3']);
    });
  });

  describe('extract', () => {
    it('should extract from text reassembled from chunks', async () => {
      const { service, repository, extract } = setup();
      repository.addReadyDocument('doc-1', AGREEMENT_PAGES, 200, 40);

      const response = await service.extract('doc-1');

      expect(extract).toHaveBeenCalledWith(AGREEMENT);
      expect(response.document_id).toBe('doc-1');
      expect(response.governing_law).toBe('New York');
      expect(response.confidence_score).toBe(1);
    });

    it('should serve the cached record on the next call', async () => {
      const { service, repository, cache, extract } = setup();
      repository.addReadyDocument('doc-1', AGREEMENT_PAGES, 200, 40);

      const first = await service.extract('doc-1');
      const second = await service.extract('doc-1');

      expect(second).toEqual(first);
      expect(extract).toHaveBeenCalledTimes(1);
      expect(cache.size).toBe(1);
    });

    it('should keep serving a stale cached record after the chunks change', async () => {
      const { service, repository } = setup();
      repository.addReadyDocument('doc-1', AGREEMENT_PAGES, 200, 40);
      await service.extract('doc-1');

      repository.addReadyDocument('doc-1', [{ pageNumber: 1, text: 'Governing Law: Ohio.' }], 200, 40);

      await expect(service.extract('doc-1')).resolves.toMatchObject({ governing_law: 'New York' });
    });

    it('should raise not_found before looking at chunks', async () => {
      const { service } = setup();
      await expect(service.extract('missing')).rejects.toThrow(DocumentNotFoundError);
    });

    it('should raise no_text for a document without chunks', async () => {
      const { service, repository } = setup();
      repository.addReadyDocument('empty', [], 200, 40);

      await expect(service.extract('empty')).rejects.toThrow(NoTextAvailableError);
      await expect(service.extract('empty')).rejects.toMatchObject({ code: 'no_text' });
    });
  });

  describe('audit', () => {
    it('should attach page numbers and persist the findings', async () => {
      const { service, repository } = setup();
      repository.addReadyDocument('doc-1', AGREEMENT_PAGES, 200, 40);

      const response = await service.audit('doc-1');

      expect(response.total_findings).toBe(2);
      expect(response.risk_score).toBe(45);
      expect(response.findings.map((f) => [f.finding_type, f.page_number])).toEqual([
        ['AUTO_RENEWAL', 2],
        ['BROAD_INDEMNITY', 1],
      ]);
      expect(repository.findings.get('doc-1')).toEqual(response.findings);
    });

    it('should reuse the cached extraction', async () => {
      const { service, repository, extract } = setup();
      repository.addReadyDocument('doc-1', AGREEMENT_PAGES, 200, 40);

      await service.extract('doc-1');
      await service.audit('doc-1');

      expect(extract).toHaveBeenCalledTimes(1);
    });

    it('should leave page_number null for findings without a location', async () => {
      const { service, repository } = setup();
      repository.addReadyDocument('doc-2', [{ pageNumber: 1, text: 'The parties agree to cooperate.' }], 200, 40);

      const response = await service.audit('doc-2');

      expect(response.findings.map((f) => [f.finding_type, f.page_number])).toEqual([
        ['MISSING_TERMINATION', null],
        ['MISSING_GOVERNING_LAW', null],
      ]);
      expect(response.summary).toBe('Found 2 issues: 1 high, 1 medium, 0 low severity. Risk score: 45/100.');
    });
  });

  describe('search', () => {
    it('should return citations ranked by relevance', async () => {
      const { service, repository } = setup();
      repository.addReadyDocument('doc-1', AGREEMENT_PAGES, 200, 40);

      const response = await service.search('renew notice', null, 5);

      expect(response.query).toBe('renew notice');
      expect(response.results.map((r) => [r.document_id, r.page_number, r.char_start, r.char_end, r.relevance_score])).toEqual([
        ['doc-1', 2, 739, 931, 2],
        ['doc-1', 2, 891, 1034, 2],
      ]);
      expect(response.results[0].text_excerpt).toBe(AGREEMENT.slice(739, 931));
    });

    it('should restrict the search to the given documents', async () => {
      const { service, repository } = setup();
      repository.addReadyDocument('doc-1', AGREEMENT_PAGES, 200, 40);
      repository.addReadyDocument('doc-2', [{ pageNumber: 1, text: 'Renewal requires notice.' }], 200, 40);

      const all = await service.search('renewal', null, 5);
      const onlySecond = await service.search('renewal', ['doc-2'], 5);

      expect(new Set(all.results.map((r) => r.document_id))).toEqual(new Set(['doc-1', 'doc-2']));
      expect(onlySecond.results.map((r) => r.document_id)).toEqual(['doc-2']);
    });

    it('should cap excerpts at 300 characters', async () => {
      const { service, repository } = setup();
      repository.addReadyDocument('long', [{ pageNumber: 1, text: `keyword ${'z'.repeat(600)}` }], 1000, 100);

      const response = await service.search('keyword', null, 5);

      expect(response.results[0].text_excerpt).toHaveLength(300);
    });
  });
});
