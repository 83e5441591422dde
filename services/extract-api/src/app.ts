/**
 * Extract API
 *
 * Accepts a PDF contract and returns the extracted contract record.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import { ulid } from 'ulid';
import {
  config as defaultConfig,
  contractExtractor,
  documentsProcessedCounter,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  InvalidDocumentError,
  logger,
  matchedFields,
  PayloadTooLargeError,
  RequestTimeoutError,
  runWithContext,
  runWithContextAsync,
  toErrorEnvelope,
  validateRecord,
  type Config,
  type DocumentExtractor,
  type DocumentInfo,
  type ExtractResponse,
  type HealthResponse,
  type TextSourceKind,
} from '@contract-ocr/shared';
import type { DocumentTextSource } from './lib/text-source';

const PDF_TYPES = ['application/pdf', 'application/octet-stream'];
const PDF_MAGIC = '%PDF-';

export interface AppOptions {
  textSource: DocumentTextSource;
  extractor?: DocumentExtractor;
  config?: Config;
}

function correlationIdOf(res: Response): string {
  const value = res.getHeader('X-Correlation-Id');
  return typeof value === 'string' ? value : ulid();
}

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with RequestTimeoutError whether or not the task honours the signal.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timedOut = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new RequestTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Check the upload and return the PDF bytes.
 */
function readUpload(req: Request): { pdf: Buffer; filename: string | null } {
  if (!req.is(PDF_TYPES)) {
    throw new InvalidDocumentError('Content-Type must be application/pdf');
  }

  const filename = headerValue(req, 'x-filename') ?? null;
  if (filename !== null && !/\.pdf$/i.test(filename)) {
    throw new InvalidDocumentError('Only PDF files are accepted');
  }
  if (filename === null && req.is('application/octet-stream')) {
    throw new InvalidDocumentError('X-Filename header is required for application/octet-stream');
  }

  const body: unknown = req.body;
  if (!Buffer.isBuffer(body) || body.length === 0) {
    throw new InvalidDocumentError('Request body is empty');
  }
  if (body.subarray(0, PDF_MAGIC.length).toString('latin1') !== PDF_MAGIC) {
    throw new InvalidDocumentError('Uploaded file is not a PDF');
  }

  return { pdf: body, filename };
}

function isTooLarge(error: unknown): boolean {
  return error instanceof Error && 'type' in error && error.type === 'entity.too.large';
}

export function createApp(options: AppOptions): Express {
  const { textSource } = options;
  const extractor = options.extractor ?? contractExtractor;
  const cfg = options.config ?? defaultConfig;

  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = headerValue(req, 'x-correlation-id') ?? ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const labels = { method: req.method, path: req.path, status: res.statusCode.toString() };

      httpRequestDurationHistogram.observe(labels, duration);
      httpRequestsCounter.inc(labels);

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (req: Request, res: Response, next: NextFunction) => {
    textSource
      .health()
      .then((ocr) => {
        const body: HealthResponse = {
          status: ocr.tesseract && ocr.pdftoppm ? 'healthy' : 'degraded',
          service: cfg.serviceName,
          ocr,
          timestamp: new Date().toISOString(),
        };
        res.json(body);
      })
      .catch(next);
  });

  // Metrics endpoint
  app.get('/metrics', (req: Request, res: Response, next: NextFunction) => {
    getMetrics()
      .then((metrics) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.send(metrics);
      })
      .catch(next);
  });

  /**
   * POST /extract
   * Body is the raw PDF. Returns the extraction record and how it was produced.
   */
  async function extract(req: Request, res: Response): Promise<void> {
    const correlationId = correlationIdOf(res);
    const { pdf, filename } = readUpload(req);

    const docInfo: DocumentInfo = {
      document_id: ulid(),
      source_filename: filename,
      byte_size: pdf.length,
    };

    await runWithContextAsync(
      { correlationId, documentId: docInfo.document_id, filename: filename ?? undefined },
      async () => {
        const start = Date.now();
        let textSourceKind: TextSourceKind | 'none' = 'none';

        logger.info('Document received', { byte_size: docInfo.byte_size });

        try {
          const text = await withTimeout(cfg.requestTimeoutMs, (signal) =>
            textSource.read(pdf, { signal })
          );
          textSourceKind = text.source;

          const result = extractor.extract(text.pages, docInfo, { correlationId });

          const validation = validateRecord(result.record);
          if (!validation.valid) {
            logger.warn('ExtractionRecord validation failed', { errors: validation.errors });
          }

          documentsProcessedCounter.inc({ text_source: text.source, status: 'success' });

          const response: ExtractResponse = {
            success: true,
            message: 'Extraction completed.',
            extraction: { ...result.record },
            metadata: {
              correlation_id: correlationId,
              document_id: docInfo.document_id,
              page_count: result.metadata.pageCount,
              text_source: text.source,
              algorithm_version: result.metadata.algorithmVersion,
              duration_ms: Date.now() - start,
              matched_fields: matchedFields(result.record),
              warnings: [...text.warnings, ...result.warnings],
            },
          };
          res.json(response);
        } catch (error) {
          documentsProcessedCounter.inc({ text_source: textSourceKind, status: 'failed' });
          throw error;
        }
      }
    );
  }

  app.post(
    '/extract',
    express.raw({ type: PDF_TYPES, limit: cfg.maxUploadBytes }),
    (req: Request, res: Response, next: NextFunction) => {
      extract(req, res).catch(next);
    }
  );

  // Error handler: every failure leaves as an ErrorEnvelope
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const mapped = isTooLarge(error) ? new PayloadTooLargeError(cfg.maxUploadBytes) : error;
    const { status, body } = toErrorEnvelope(mapped, correlationIdOf(res));

    if (status >= 500) {
      logger.error('Extraction request failed', mapped, { path: req.path, code: body.error.code });
    } else {
      logger.warn('Extraction request rejected', {
        path: req.path,
        code: body.error.code,
        message: body.error.message,
      });
    }

    res.status(status).json(body);
  });

  return app;
}
