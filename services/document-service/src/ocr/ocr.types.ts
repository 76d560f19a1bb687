/** Turns the pixels of one image into plain text. */
export interface OcrEngine {
  recognize(image: Buffer, mimeType: string): Promise<string>;
}

/** Renders every page of a PDF to an image, in page order. */
export interface PdfRasterizer {
  rasterize(pdf: Buffer): Promise<RasterizedPage[]>;
}

export interface RasterizedPage {
  page: number;
  image: Buffer;
  mimeType: string;
}
