/**
 * Chunker tests: overlap, page attribution, boundaries and reassembly
 */

import {
  chunkPages,
  concatenatePages,
  pageForOffset,
  reassembleText,
  InvalidConfigurationError,
  splitsSurrogatePair,
  type Chunk,
  type PageText,
} from '@contract-intel/shared';

function spans(chunks: Chunk[]): Array<[number, number]> {
  return chunks.map((c) => [c.char_start, c.char_end]);
}

const MULTI_PAGE: PageText[] = [
  { pageNumber: 1, text: 'The Supplier shall deliver the goods. '.repeat(40).trim() },
  { pageNumber: 2, text: 'Payment is due within thirty days of invoice. '.repeat(30).trim() },
  { pageNumber: 3, text: 'This Agreement is governed by the laws of Delaware.' },
];

describe('Chunker', () => {
  describe('basic windows', () => {
    it('should split 1500 characters into [0,1000) and [800,1500)', () => {
      const chunks = chunkPages([{ pageNumber: 1, text: 'A'.repeat(1500) }], {
        chunkSize: 1000,
        overlap: 200,
      });

      expect(chunks).toHaveLength(2);
      expect(spans(chunks)).toEqual([
        [0, 1000],
        [800, 1500],
      ]);
      expect(chunks.map((c) => c.chunk_index)).toEqual([0, 1]);
      expect(chunks[1].text).toBe('A'.repeat(700));
    });

    it('should use 1000/200 when no options are given', () => {
      const chunks = chunkPages([{ pageNumber: 1, text: 'A'.repeat(1500) }]);
      expect(spans(chunks)).toEqual([
        [0, 1000],
        [800, 1500],
      ]);
    });

    it('should cut at the exact offset when no boundary exists', () => {
      const chunks = chunkPages([{ pageNumber: 1, text: 'abcdefghijklmnopqrstuvwxyz' }], {
        chunkSize: 10,
        overlap: 3,
      });

      expect(chunks.map((c) => c.text)).toEqual(['abcdefghij', 'hijklmnopq', 'opqrstuvwx', 'vwxyz']);
      expect(spans(chunks)).toEqual([
        [0, 10],
        [7, 17],
        [14, 24],
        [21, 26],
      ]);
    });

    it('should return a single chunk for text shorter than the chunk size', () => {
      const chunks = chunkPages([{ pageNumber: 4, text: 'Short contract.' }], {
        chunkSize: 1000,
        overlap: 200,
      });

      expect(chunks).toEqual([
        { chunk_index: 0, page_number: 4, text: 'Short contract.', char_start: 0, char_end: 15 },
      ]);
    });
  });

  describe('empty input', () => {
    it('should return no chunks for no pages', () => {
      expect(chunkPages([], { chunkSize: 1000, overlap: 200 })).toEqual([]);
    });

    it('should return no chunks when every page is empty', () => {
      const pages = [
        { pageNumber: 1, text: '' },
        { pageNumber: 2, text: '' },
      ];
      expect(chunkPages(pages, { chunkSize: 1000, overlap: 200 })).toEqual([]);
    });
  });

  describe('configuration errors', () => {
    it('should reject overlap larger than the chunk size', () => {
      expect(() =>
        chunkPages([{ pageNumber: 1, text: 'x' }], { chunkSize: 1000, overlap: 1200 })
      ).toThrow(InvalidConfigurationError);
    });

    it('should reject overlap equal to the chunk size', () => {
      expect(() =>
        chunkPages([{ pageNumber: 1, text: 'x' }], { chunkSize: 100, overlap: 100 })
      ).toThrow('overlap (100) must be smaller than chunk_size (100)');
    });

    it('should reject a non-positive chunk size', () => {
      expect(() => chunkPages([{ pageNumber: 1, text: 'x' }], { chunkSize: 0, overlap: 0 })).toThrow(
        'chunk_size must be a positive integer, got 0'
      );
      expect(() =>
        chunkPages([{ pageNumber: 1, text: 'x' }], { chunkSize: -5, overlap: 0 })
      ).toThrow(InvalidConfigurationError);
    });

    it('should reject a negative overlap', () => {
      expect(() =>
        chunkPages([{ pageNumber: 1, text: 'x' }], { chunkSize: 10, overlap: -1 })
      ).toThrow('overlap must be a non-negative integer, got -1');
    });

    it('should validate before looking at the input', () => {
      expect(() => chunkPages([], { chunkSize: 10, overlap: 20 })).toThrow(InvalidConfigurationError);
    });

    it('should carry the invalid_configuration code', () => {
      try {
        chunkPages([], { chunkSize: 0, overlap: 0 });
        throw new Error('expected chunkPages to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidConfigurationError);
        expect(error).toMatchObject({ code: 'invalid_configuration', name: 'InvalidConfigurationError' });
      }
    });
  });

  describe('boundary preference', () => {
    it('should cut after a sentence break inside the lookback window', () => {
      const chunks = chunkPages([{ pageNumber: 1, text: 'Short one. Another sentence follows here' }], {
        chunkSize: 16,
        overlap: 3,
      });

      expect(chunks.map((c) => c.text)).toEqual([
        'Short one. ',
        'e. Another ',
        'er sentence ',
        'ce follows here',
      ]);
    });

    it('should cut at the nominal offset when lookback is disabled', () => {
      const chunks = chunkPages([{ pageNumber: 1, text: 'Short one. Another sentence follows here' }], {
        chunkSize: 16,
        overlap: 3,
        boundaryLookback: 0,
      });

      expect(chunks.map((c) => c.text)).toEqual(['Short one. Anoth', 'other sentence f', 'e follows here']);
    });

    it('should fall back to whitespace when there is no sentence break', () => {
      const chunks = chunkPages([{ pageNumber: 1, text: 'Alpha beta gamma delta epsilon' }], {
        chunkSize: 12,
        overlap: 2,
      });

      expect(chunks.map((c) => c.text)).toEqual(['Alpha beta ', 'a gamma ', 'a delta ', 'a epsilon']);
    });
  });

  describe('page attribution', () => {
    it('should concatenate pages in page order and attribute chunks by start offset', () => {
      const pages = [
        { pageNumber: 2, text: 'Second page text.' },
        { pageNumber: 1, text: 'First page text here.' },
      ];
      const chunks = chunkPages(pages, { chunkSize: 16, overlap: 4 });

      expect(chunks).toEqual([
        { chunk_index: 0, page_number: 1, text: 'First page text ', char_start: 0, char_end: 16 },
        { chunk_index: 1, page_number: 1, text: 'ext here.\n', char_start: 12, char_end: 22 },
        { chunk_index: 2, page_number: 1, text: 're.\n\nSecond page', char_start: 18, char_end: 34 },
        { chunk_index: 3, page_number: 2, text: 'page text.', char_start: 30, char_end: 40 },
      ]);
    });

    it('should record page spans including the separator', () => {
      const doc = concatenatePages([
        { pageNumber: 1, text: 'abc' },
        { pageNumber: 2, text: '' },
        { pageNumber: 3, text: 'de' },
      ]);

      expect(doc.text).toBe('abc\n\nde');
      expect(doc.spans).toEqual([
        { pageNumber: 1, start: 0, end: 5 },
        { pageNumber: 3, start: 5, end: 7 },
      ]);
    });

    it('should find the page of an offset through the chunks', () => {
      const chunks = chunkPages(
        [
          { pageNumber: 1, text: 'First page text here.' },
          { pageNumber: 2, text: 'Second page text.' },
        ],
        { chunkSize: 16, overlap: 4 }
      );

      expect(pageForOffset(chunks, 0)).toBe(1);
      expect(pageForOffset(chunks, 20)).toBe(1);
      expect(pageForOffset(chunks, 35)).toBe(2);
      expect(pageForOffset(chunks, 40)).toBeNull();
    });
  });

  describe('invariants', () => {
    const chunks = chunkPages(MULTI_PAGE, { chunkSize: 300, overlap: 60 });
    const fullText = concatenatePages(MULTI_PAGE).text;

    it('should number chunks 0..N-1 without gaps', () => {
      expect(chunks.length).toBeGreaterThan(1);
      expect(chunks.map((c) => c.chunk_index)).toEqual(chunks.map((_, i) => i));
    });

    it('should overlap consecutive chunks by exactly the configured width', () => {
      for (let i = 1; i < chunks.length; i++) {
        expect(chunks[i - 1].char_end - chunks[i].char_start).toBe(60);
        expect(chunks[i].text.slice(0, 60)).toBe(chunks[i - 1].text.slice(-60));
      }
    });

    it('should keep each chunk text equal to its slice of the document', () => {
      for (const chunk of chunks) {
        expect(chunk.text).toBe(fullText.slice(chunk.char_start, chunk.char_end));
        expect(chunk.text.length).toBeLessThanOrEqual(300);
      }
    });

    it('should reassemble the original text exactly', () => {
      expect(reassembleText(chunks)).toBe(fullText);
    });

    it('should reassemble regardless of chunk order', () => {
      expect(reassembleText([...chunks].reverse())).toBe(fullText);
    });

    it('should be deterministic', () => {
      expect(chunkPages(MULTI_PAGE, { chunkSize: 300, overlap: 60 })).toEqual(chunks);
    });

    it('should end the last chunk at the end of the document', () => {
      expect(chunks[chunks.length - 1].char_end).toBe(fullText.length);
    });

    it('should attribute chunks to pages in non-decreasing order', () => {
      const pages = chunks.map((c) => c.page_number);
      expect(pages[0]).toBe(1);
      expect(pages).toEqual([...pages].sort((a, b) => a - b));
      expect(new Set(pages)).toEqual(new Set([1, 2]));
    });
  });

  describe('reassembly', () => {
    it('should return an empty string for no chunks', () => {
      expect(reassembleText([])).toBe('');
    });

    it('should tolerate zero overlap', () => {
      const chunks = chunkPages([{ pageNumber: 1, text: 'abcdefghijklmnopqrstuvwxyz' }], {
        chunkSize: 10,
        overlap: 0,
      });
      expect(chunks.map((c) => c.text)).toEqual(['abcdefghij', 'klmnopqrst', 'uvwxyz']);
      expect(reassembleText(chunks)).toBe('abcdefghijklmnopqrstuvwxyz');
    });
  });

  describe('surrogate pairs', () => {
    const EMOJI_TEXT = `a${'\u{1F600}'.repeat(30)}`;

    it('should not cut inside a pair when a whole-pair cut is available', () => {
      const chunks = chunkPages([{ pageNumber: 1, text: EMOJI_TEXT }], { chunkSize: 10, overlap: 2 });

      expect(chunks.map((c) => [c.char_start, c.char_end])).toEqual([
        [0, 9],
        [7, 17],
        [15, 25],
        [23, 33],
        [31, 41],
        [39, 49],
        [47, 57],
        [55, 61],
      ]);
      for (const chunk of chunks) {
        expect(Buffer.from(chunk.text, 'utf8').toString('utf8')).toBe(chunk.text);
      }
      expect(reassembleText(chunks)).toBe(EMOJI_TEXT);
    });

    it('should keep chunk ends whole when the overlap is odd', () => {
      const chunks = chunkPages([{ pageNumber: 1, text: EMOJI_TEXT }], { chunkSize: 10, overlap: 3 });

      expect(chunks.some((c) => splitsSurrogatePair(EMOJI_TEXT, c.char_end))).toBe(false);
      for (let i = 1; i < chunks.length; i++) {
        expect(chunks[i].char_start).toBe(chunks[i - 1].char_end - 3);
      }
      expect(reassembleText(chunks)).toBe(EMOJI_TEXT);
    });
  });
});
