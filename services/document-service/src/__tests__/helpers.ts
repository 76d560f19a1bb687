import fs from 'fs';
import os from 'os';
import path from 'path';
import { DataSource } from 'typeorm';
import { createDataSourceOptions } from '@medidoc/shared';
import { ServiceConfig } from '../config/service.config';
import { MedicalDocument } from '../entities/MedicalDocument';
import { CompletionClient, CompletionRequest } from '../groq/completion.types';
import { OcrEngine, PdfRasterizer, RasterizedPage } from '../ocr/ocr.types';

export function makeTempDir(prefix = 'medidoc-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(uploadDir: string): ServiceConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    uploadDir,
    database: {
      type: 'better-sqlite3',
      database: ':memory:',
      host: 'localhost',
      port: 5432,
      username: 'postgres',
      password: 'postgres',
      synchronize: true,
    },
    completion: {
      apiKey: 'test-key',
      baseUrl: 'http://llm.test',
      model: 'test-model',
      timeoutMs: 1000,
    },
    ocr: {
      apiKey: undefined,
      model: 'test-ocr-model',
      pdfDensity: 72,
    },
  };
}

export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource(
    createDataSourceOptions(testConfig(':unused:').database, [MedicalDocument])
  );
  await dataSource.initialize();
  return dataSource;
}

type Responder = (request: CompletionRequest) => string | Promise<string>;

/** Records every request and answers through `respond`, which may throw. */
export class FakeCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request);
  }
}

/** "Recognizes" an image by decoding its bytes as UTF-8. */
export class FakeOcrEngine implements OcrEngine {
  readonly calls: Array<{ text: string; mimeType: string }> = [];
  failWith?: Error;

  async recognize(image: Buffer, mimeType: string): Promise<string> {
    if (this.failWith) throw this.failWith;
    const text = image.toString('utf-8');
    this.calls.push({ text, mimeType });
    return text;
  }
}

/** Treats a "PDF" as UTF-8 text with pages separated by form feeds. */
export class FakePdfRasterizer implements PdfRasterizer {
  failWith?: Error;

  async rasterize(pdf: Buffer): Promise<RasterizedPage[]> {
    if (this.failWith) throw this.failWith;
    return pdf
      .toString('utf-8')
      .split('\f')
      .map((text, idx) => ({ page: idx + 1, image: Buffer.from(text, 'utf-8'), mimeType: 'image/png' }));
  }
}

export const MULTIPART_BOUNDARY = '----medidoc-test-boundary';

export function multipartFile(params: {
  field?: string;
  filename: string;
  contentType: string;
  data: Buffer | string;
}): { payload: Buffer; headers: Record<string, string> } {
  const head = Buffer.from(
    `--${MULTIPART_BOUNDARY}\r\n` +
      `Content-Disposition: form-data; name="${params.field ?? 'file'}"; filename="${params.filename}"\r\n` +
      `Content-Type: ${params.contentType}\r\n\r\n`
  );
  const data = typeof params.data === 'string' ? Buffer.from(params.data, 'utf-8') : params.data;
  const tail = Buffer.from(`\r\n--${MULTIPART_BOUNDARY}--\r\n`);

  return {
    payload: Buffer.concat([head, data, tail]),
    headers: { 'content-type': `multipart/form-data; boundary=${MULTIPART_BOUNDARY}` },
  };
}
