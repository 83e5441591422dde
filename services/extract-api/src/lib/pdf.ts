/**
 * PDF Text Layer
 *
 * Reads embedded text from PDF bytes using pdf-parse.
 */

import { PDFParse } from 'pdf-parse';
import { logger, type PageText } from '@contract-ocr/shared';

/**
 * Extract text from every page, one text line per visual line, so a label
 * and the value printed beside it stay together.
 */
export async function readTextLayer(data: Uint8Array): Promise<PageText[]> {
  // pdf.js transfers the buffer it is given to its worker
  const parser = new PDFParse({ data: data.slice() });

  try {
    const result = await parser.getText();

    const pages: PageText[] = result.pages
      .map((page) => ({ pageNumber: page.num, text: page.text.trim() }))
      .sort((a, b) => a.pageNumber - b.pageNumber);

    logger.info('PDF text layer read', {
      totalPages: result.total,
      totalChars: pages.reduce((sum, page) => sum + page.text.length, 0),
    });

    return pages;
  } finally {
    await parser.destroy();
  }
}
