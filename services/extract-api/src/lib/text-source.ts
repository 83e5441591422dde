/**
 * Document Text Source
 *
 * Turns PDF bytes into per-page text. The embedded text layer is read first;
 * when it carries too little text (scanned contracts) the pages are
 * rasterized and OCR'd instead.
 */

import {
  logger,
  textAcquisitionDurationHistogram,
  type EngineHealth,
  type PageText,
  type TextSourceKind,
} from '@contract-ocr/shared';

export interface ReadOptions {
  /** Aborted when the request times out; OCR subprocesses are killed */
  signal?: AbortSignal;
}

export interface TextReadResult {
  pages: PageText[];
  source: TextSourceKind;
  warnings: string[];
}

export interface DocumentTextSource {
  read(pdf: Buffer, options?: ReadOptions): Promise<TextReadResult>;
  health(): Promise<EngineHealth>;
}

/**
 * Reads the embedded text layer, one entry per page.
 */
export type TextLayerReader = (pdf: Uint8Array) => Promise<PageText[]>;

export interface OcrEngine {
  recognize(pdf: Uint8Array, options?: ReadOptions): Promise<PageText[]>;
  health(): Promise<EngineHealth>;
}

export interface PdfDocumentTextSourceOptions {
  readTextLayer: TextLayerReader;
  ocr: OcrEngine;
  /** Text layers with fewer non-whitespace characters are treated as scans */
  minEmbeddedTextChars: number;
}

/**
 * Count of non-whitespace characters over all pages
 */
export function textLength(pages: readonly PageText[]): number {
  return pages.reduce((sum, page) => sum + page.text.replace(/\s/g, '').length, 0);
}

export class PdfDocumentTextSource implements DocumentTextSource {
  constructor(private readonly options: PdfDocumentTextSourceOptions) {}

  async read(pdf: Buffer, options: ReadOptions = {}): Promise<TextReadResult> {
    const warnings: string[] = [];

    const layerStart = Date.now();
    let layerPages: PageText[] = [];
    try {
      layerPages = await this.options.readTextLayer(new Uint8Array(pdf));
    } catch (error) {
      logger.warn('Text layer could not be read, falling back to OCR', {
        error: error instanceof Error ? error.message : String(error),
      });
      warnings.push('Embedded text layer could not be read');
    }
    textAcquisitionDurationHistogram.observe(
      { text_source: 'text_layer' },
      (Date.now() - layerStart) / 1000
    );

    const layerChars = textLength(layerPages);
    if (layerChars >= this.options.minEmbeddedTextChars) {
      logger.info('Using embedded text layer', {
        page_count: layerPages.length,
        text_chars: layerChars,
      });
      return { pages: layerPages, source: 'text_layer', warnings };
    }

    logger.info('Text layer too sparse, running OCR', {
      text_chars: layerChars,
      min_chars: this.options.minEmbeddedTextChars,
    });

    const ocrStart = Date.now();
    const ocrPages = await this.options.ocr.recognize(new Uint8Array(pdf), options);
    textAcquisitionDurationHistogram.observe({ text_source: 'ocr' }, (Date.now() - ocrStart) / 1000);

    const ocrChars = textLength(ocrPages);
    if (ocrChars === 0 && layerChars > 0) {
      warnings.push('OCR produced no text, using the sparse embedded text layer');
      return { pages: layerPages, source: 'text_layer', warnings };
    }

    logger.info('OCR complete', { page_count: ocrPages.length, text_chars: ocrChars });
    return { pages: ocrPages, source: 'ocr', warnings };
  }

  health(): Promise<EngineHealth> {
    return this.options.ocr.health();
  }
}
