/**
 * Extract API entry point
 */

import { config, logger } from '@contract-ocr/shared';
import { createApp } from './app';
import { TesseractOcrEngine } from './lib/ocr';
import { readTextLayer } from './lib/pdf';
import { PdfDocumentTextSource } from './lib/text-source';

const textSource = new PdfDocumentTextSource({
  readTextLayer,
  ocr: TesseractOcrEngine.fromConfig(config),
  minEmbeddedTextChars: config.minEmbeddedTextChars,
});

const app = createApp({ textSource });

const server = app.listen(config.port, () => {
  logger.info('Extract API started', {
    port: config.port,
    tesseract: config.tesseractCmd,
    pdftoppm: config.pdftoppmCmd,
    date_order: config.dateOrder,
  });
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
