/**
 * Configuration and structured logging tests
 */

import {
  formatLog,
  loadConfig,
  resolveChunkingOptions,
  runWithContext,
} from '@contract-intel/shared';

describe('loadConfig', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('should fall back to defaults', () => {
    delete process.env.CHUNK_SIZE;
    delete process.env.CHUNK_OVERLAP;
    delete process.env.SIGNATORY_WINDOW;
    delete process.env.MAX_UPLOAD_BYTES;

    const cfg = loadConfig();

    expect(cfg.chunkSize).toBe(1000);
    expect(cfg.chunkOverlap).toBe(200);
    expect(cfg.signatoryWindow).toBe(1500);
    expect(cfg.maxUploadBytes).toBe(25 * 1024 * 1024);
  });

  it('should read overrides from the environment', () => {
    process.env.CHUNK_SIZE = '500';
    process.env.CHUNK_OVERLAP = '50';
    process.env.UPLOAD_DIR = '/tmp/contracts';

    const cfg = loadConfig();

    expect(resolveChunkingOptions(cfg)).toEqual({ chunkSize: 500, overlap: 50 });
    expect(cfg.uploadDir).toBe('/tmp/contracts');
  });

  it('should treat an empty variable as unset', () => {
    process.env.CHUNK_SIZE = '';
    expect(loadConfig().chunkSize).toBe(1000);
  });
});

describe('formatLog', () => {
  it('should include the active correlation and document IDs', () => {
    const line = runWithContext({ correlationId: 'corr-1', documentId: 'doc-9' }, () =>
      formatLog('INFO', 'Document chunked', { num_chunks: 3 })
    );

    const entry: unknown = JSON.parse(line);
    expect(entry).toMatchObject({
      level: 'INFO',
      correlationId: 'corr-1',
      documentId: 'doc-9',
      message: 'Document chunked',
      num_chunks: 3,
    });
  });

  it('should generate a correlation ID outside a context', () => {
    const entry: unknown = JSON.parse(formatLog('WARN', 'No context'));
    expect(entry).toMatchObject({ level: 'WARN', message: 'No context', correlationId: expect.any(String) });
  });
});
