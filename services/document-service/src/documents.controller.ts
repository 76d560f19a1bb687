import { Controller, Get, HttpCode, Post, Req } from '@nestjs/common';
import type { Multipart } from '@fastify/multipart';
import type { CorrelatedRequest } from './http/correlation';
import { DocumentList, DocumentsService, UploadResult } from './documents.service';
import { MissingFileError } from './errors';

interface ReceivedFile {
  filename: string;
  contentType: string;
  bytes: Buffer;
}

/** Buffers the first file part; later file parts are drained and ignored. */
async function readFirstFile(parts: AsyncIterableIterator<Multipart>): Promise<ReceivedFile | undefined> {
  let received: ReceivedFile | undefined;

  for await (const part of parts) {
    if (part.type !== 'file') continue;

    if (!received) {
      received = { filename: part.filename, contentType: part.mimetype, bytes: await part.toBuffer() };
      continue;
    }

    part.file.resume();
  }

  return received;
}

@Controller()
export class DocumentsController {
  constructor(private readonly documentsService: DocumentsService) {}

  @Get('/')
  root() {
    return { message: 'MediDoc API is running' };
  }

  @Post('/upload')
  @HttpCode(200)
  async upload(@Req() req: CorrelatedRequest): Promise<UploadResult> {
    if (!req.isMultipart()) {
      throw new MissingFileError();
    }

    const received = await readFirstFile(req.parts());
    if (!received) {
      throw new MissingFileError();
    }

    return this.documentsService.ingest({ ...received, correlationId: req.correlationId });
  }

  @Get('/documents')
  async list(): Promise<DocumentList> {
    return this.documentsService.listDocuments();
  }
}
