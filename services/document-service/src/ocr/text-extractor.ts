import { Inject, Injectable } from '@nestjs/common';
import fs from 'fs/promises';
import path from 'path';
import { createLogger } from '@medidoc/shared';
import { OCR_ENGINE, PDF_RASTERIZER } from '../tokens';
import { SERVICE_NAME } from '../config/service.config';
import { OcrEngine, PdfRasterizer } from './ocr.types';

const IMAGE_MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

export const imageMimeType = (filePath: string): string =>
  IMAGE_MIME_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';

/**
 * Flattens a stored PDF or image into text.
 *
 * Failure is reported as an empty string, never as a rejection: a missing
 * file, a rasterizer error and an OCR error all come back as `''`. Callers
 * treat empty or whitespace-only output as "nothing could be read".
 */
@Injectable()
export class TextExtractor {
  private readonly logger = createLogger({ serviceName: SERVICE_NAME }).child({ component: 'TextExtractor' });

  constructor(
    @Inject(OCR_ENGINE) private readonly ocr: OcrEngine,
    @Inject(PDF_RASTERIZER) private readonly rasterizer: PdfRasterizer
  ) {}

  async extract(filePath: string): Promise<string> {
    try {
      const bytes = await this.readIfExists(filePath);
      if (!bytes) {
        this.logger.error('File not found', undefined, { filePath });
        return '';
      }

      if (path.extname(filePath).toLowerCase() === '.pdf') {
        const pages = await this.rasterizer.rasterize(bytes);
        let text = '';
        for (const page of pages) {
          text += (await this.ocr.recognize(page.image, page.mimeType)) + '\n';
        }
        this.logger.debug('PDF pages recognized', { filePath, pages: pages.length });
        return text.trim();
      }

      const text = await this.ocr.recognize(bytes, imageMimeType(filePath));
      return text.trim();
    } catch (error) {
      this.logger.error('Error extracting text', error, { filePath });
      return '';
    }
  }

  private async readIfExists(filePath: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw error;
    }
  }
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;
