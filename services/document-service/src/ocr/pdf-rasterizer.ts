import { Inject, Injectable } from '@nestjs/common';
import { fromBuffer } from 'pdf2pic';
import { SERVICE_CONFIG } from '../tokens';
import { ServiceConfig } from '../config/service.config';
import { PdfRasterizer, RasterizedPage } from './ocr.types';

/**
 * Page rendering through pdf2pic. Needs GraphicsMagick and Ghostscript on the host.
 */
@Injectable()
export class Pdf2PicRasterizer implements PdfRasterizer {
  constructor(@Inject(SERVICE_CONFIG) private readonly config: ServiceConfig) {}

  async rasterize(pdf: Buffer): Promise<RasterizedPage[]> {
    const convert = fromBuffer(pdf, {
      density: this.config.ocr.pdfDensity,
      format: 'png',
      width: 1700,
      preserveAspectRatio: true,
    });

    const responses = await convert.bulk(-1, { responseType: 'buffer' });

    const pages: RasterizedPage[] = [];
    responses.forEach((response, idx) => {
      if (!response.buffer) {
        throw new Error(`pdf2pic returned no image for page ${response.page ?? idx + 1}`);
      }
      pages.push({ page: response.page ?? idx + 1, image: response.buffer, mimeType: 'image/png' });
    });

    return pages.sort((a, b) => a.page - b.page);
  }
}
