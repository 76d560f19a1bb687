import { Injectable } from '@nestjs/common';
import { createLogger, isServiceError } from '@medidoc/shared';
import { SERVICE_NAME } from './config/service.config';
import { DocumentListRow, DocumentStore } from './document-store';
import {
  DocumentsUnavailableError,
  EmptyUploadError,
  ExtractionFailedError,
  ProcessingFailedError,
  UnsupportedTypeError,
} from './errors';
import { ExtractedFields } from './extraction/document-fields';
import { FieldExtractor } from './extraction/field-extractor';
import { TextExtractor } from './ocr/text-extractor';
import { UploadStorage } from './upload-storage';

export const ALLOWED_CONTENT_TYPES: ReadonlySet<string> = new Set([
  'application/pdf',
  'image/jpeg',
  'image/jpg',
  'image/png',
]);

export interface UploadResult {
  filename: string;
  info: ExtractedFields;
  status: 'success';
}

export interface DocumentList {
  documents: DocumentListRow[];
  count: number;
}

@Injectable()
export class DocumentsService {
  private readonly logger = createLogger({ serviceName: SERVICE_NAME }).child({ component: 'DocumentsService' });

  constructor(
    private readonly storage: UploadStorage,
    private readonly textExtractor: TextExtractor,
    private readonly fieldExtractor: FieldExtractor,
    private readonly store: DocumentStore
  ) {}

  /**
   * validate type → write raw bytes → OCR → classify → insert.
   * Only the named ServiceErrors leave this method; anything else becomes ProcessingFailed.
   */
  async ingest(params: {
    filename: string;
    contentType: string;
    bytes: Buffer;
    correlationId?: string;
  }): Promise<UploadResult> {
    const { filename, contentType, bytes, correlationId } = params;

    if (!ALLOWED_CONTENT_TYPES.has(contentType)) {
      throw new UnsupportedTypeError(contentType);
    }
    if (bytes.length === 0) {
      throw new EmptyUploadError();
    }

    try {
      const filePath = await this.storage.save(filename, bytes);
      this.logger.info('File saved', { filePath, bytes: bytes.length, correlationId });

      const text = await this.textExtractor.extract(filePath);
      if (!text.trim()) {
        await this.storage.remove(filePath);
        throw new ExtractionFailedError();
      }

      const info = await this.fieldExtractor.classify(text);

      await this.store.insert({ filename, fields: info, content: text });

      this.logger.info('Document processed successfully', { filename, category: info.category, correlationId });
      return { filename, info, status: 'success' };
    } catch (error) {
      if (isServiceError(error)) throw error;
      this.logger.error('Unexpected error processing file', error, { filename, correlationId });
      throw new ProcessingFailedError(error);
    }
  }

  async listDocuments(): Promise<DocumentList> {
    try {
      const documents = await this.store.listAll();
      return { documents, count: documents.length };
    } catch (error) {
      this.logger.error('Error retrieving documents', error);
      throw new DocumentsUnavailableError(error);
    }
  }
}
