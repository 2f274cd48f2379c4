/**
 * PDF Text Extraction
 *
 * Extracts per-page text from PDF files using pdfjs-dist.
 */

import fs from 'fs';
import * as pdfjsLib from 'pdfjs-dist';
import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import { logger, type PageText } from '@contract-intel/shared';

// Configure worker for Node.js environment
pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

/**
 * Join text items into lines: items sharing a rounded y position form a
 * line, ordered left to right; lines run top to bottom.
 */
export function linesFromItems(items: ReadonlyArray<TextItem | TextMarkedContent>): string {
  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (!isTextItem(item) || item.str.trim() === '') continue;

    // Text on the same visual line may have slight y variations
    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  const lines: string[] = [];
  for (const y of [...itemsByY.keys()].sort((a, b) => b - a)) {
    const lineItems = itemsByY.get(y) ?? [];
    const lineText = lineItems
      .sort((a, b) => a.x - b.x)
      .map((item) => item.str)
      .join(' ')
      .trim();
    if (lineText) {
      lines.push(lineText);
    }
  }

  return lines.join('\n');
}

/**
 * Extract text from a PDF file, preserving line structure. Pages without
 * text are left out of the result but still counted in totalPages.
 */
export async function extractTextFromPdf(filePath: string): Promise<PdfTextResult> {
  logger.info('Extracting text from PDF', { filePath });

  const data = new Uint8Array(await fs.promises.readFile(filePath));
  const pdf = await pdfjsLib.getDocument({ data }).promise;

  try {
    const pages: PageText[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();
      const text = linesFromItems(textContent.items);

      if (text !== '') {
        pages.push({ pageNumber: pageNum, text });
      }
    }

    logger.info('PDF text extraction complete', {
      filePath,
      totalPages: pdf.numPages,
      pagesWithText: pages.length,
    });

    return { pages, totalPages: pdf.numPages };
  } finally {
    await pdf.destroy();
  }
}
