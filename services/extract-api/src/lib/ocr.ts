/**
 * OCR Engine
 *
 * Rasterizes PDF pages with pdftoppm, cleans each image up with sharp
 * (grayscale + contrast stretch) and reads it with the tesseract binary.
 * Page images live in a per-request temp directory that is always removed.
 */

import { execFile } from 'child_process';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import sharp from 'sharp';
import {
  logger,
  OcrEngineError,
  type Config,
  type EngineHealth,
  type PageText,
} from '@contract-ocr/shared';
import type { OcrEngine, ReadOptions } from './text-source';

const execFileAsync = promisify(execFile);

const PAGE_IMAGE = /^page-(\d+)\.png$/;

/** tesseract writes a page of text to stdout; leave room for dense pages */
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface TesseractOptions {
  tesseractCmd: string;
  pdftoppmCmd: string;
  language: string;
  dpi: number;
  psm: number;
  oem: number;
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

export class TesseractOcrEngine implements OcrEngine {
  constructor(private readonly options: TesseractOptions) {}

  static fromConfig(cfg: Config): TesseractOcrEngine {
    return new TesseractOcrEngine({
      tesseractCmd: cfg.tesseractCmd,
      pdftoppmCmd: cfg.pdftoppmCmd,
      language: cfg.ocrLanguage,
      dpi: cfg.ocrDpi,
      psm: cfg.ocrPsm,
      oem: cfg.ocrOem,
    });
  }

  async recognize(pdf: Uint8Array, options: ReadOptions = {}): Promise<PageText[]> {
    const { signal } = options;
    const workDir = await mkdtemp(path.join(os.tmpdir(), 'contract-ocr-'));

    try {
      const pdfPath = path.join(workDir, 'document.pdf');
      await writeFile(pdfPath, pdf);

      await this.run(
        this.options.pdftoppmCmd,
        ['-png', '-r', String(this.options.dpi), pdfPath, path.join(workDir, 'page')],
        signal
      );

      const images = (await readdir(workDir))
        .map((name) => {
          const match = PAGE_IMAGE.exec(name);
          return match ? { name, pageNumber: parseInt(match[1], 10) } : null;
        })
        .filter((image): image is { name: string; pageNumber: number } => image !== null)
        .sort((a, b) => a.pageNumber - b.pageNumber);

      if (images.length === 0) {
        throw new OcrEngineError('pdftoppm produced no page images');
      }

      logger.info('Rasterized PDF', { page_count: images.length, dpi: this.options.dpi });

      const pages: PageText[] = [];
      for (const image of images) {
        const source = path.join(workDir, image.name);
        const prepared = path.join(workDir, `prep-${image.pageNumber}.png`);

        await sharp(source).grayscale().normalise().toFile(prepared);

        const { stdout } = await this.run(
          this.options.tesseractCmd,
          [
            prepared,
            'stdout',
            '--oem',
            String(this.options.oem),
            '--psm',
            String(this.options.psm),
            '-l',
            this.options.language,
          ],
          signal
        );

        logger.debug('OCR page complete', { page: image.pageNumber, chars: stdout.length });
        pages.push({ pageNumber: image.pageNumber, text: stdout });
      }

      return pages;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  async health(): Promise<EngineHealth> {
    const [tesseract, pdftoppm] = await Promise.all([
      this.checkBinary(this.options.tesseractCmd, ['--version']),
      this.checkBinary(this.options.pdftoppmCmd, ['-v']),
    ]);
    return { tesseract, pdftoppm };
  }

  private async checkBinary(command: string, args: string[]): Promise<boolean> {
    try {
      await execFileAsync(command, args, { timeout: 5000 });
      return true;
    } catch (error) {
      logger.debug('OCR binary check failed', {
        command,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private async run(
    command: string,
    args: string[],
    signal: AbortSignal | undefined
  ): Promise<{ stdout: string; stderr: string }> {
    try {
      return await execFileAsync(command, args, { signal, maxBuffer: MAX_OUTPUT_BYTES });
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      if (errorCode(error) === 'ENOENT') {
        throw new OcrEngineError(
          `${path.basename(command)} not found; install it or set its path in the environment`,
          { cause: error }
        );
      }
      logger.error('OCR command failed', error, { command: path.basename(command) });
      throw new OcrEngineError(`${path.basename(command)} failed`, { cause: error });
    }
  }
}
