/**
 * In-memory extraction cache tests
 */

import { InMemoryExtractionCache, ruleBasedExtractor } from '@contract-intel/shared';

describe('InMemoryExtractionCache', () => {
  it('should return null for an unknown document', async () => {
    const cache = new InMemoryExtractionCache();
    await expect(cache.get('doc-1')).resolves.toBeNull();
  });

  it('should return the last record set for a document', async () => {
    const cache = new InMemoryExtractionCache();
    const first = ruleBasedExtractor.extract('Term: 12 months.');
    const second = ruleBasedExtractor.extract('Governing Law: Ohio.');

    await cache.set('doc-1', first);
    await cache.set('doc-1', second);

    await expect(cache.get('doc-1')).resolves.toEqual(second);
    expect(cache.size).toBe(1);
  });

  it('should keep documents apart', async () => {
    const cache = new InMemoryExtractionCache();
    const record = ruleBasedExtractor.extract('Term: 12 months.');

    await cache.set('doc-1', record);

    await expect(cache.get('doc-2')).resolves.toBeNull();
    expect(cache.size).toBe(1);
  });
});
