import { ServiceError } from '@medidoc/shared';

export class UnsupportedTypeError extends ServiceError {
  constructor(contentType: string) {
    super('UNSUPPORTED_TYPE', 400, `Only PDF and image files are allowed (got ${contentType || 'unknown'})`);
  }
}

export class EmptyUploadError extends ServiceError {
  constructor() {
    super('EMPTY_UPLOAD', 400, 'Uploaded file is empty');
  }
}

export class ExtractionFailedError extends ServiceError {
  constructor() {
    super('EXTRACTION_FAILED', 400, 'Could not extract text from the uploaded file');
  }
}

export class ProcessingFailedError extends ServiceError {
  constructor(cause: unknown) {
    super('PROCESSING_FAILED', 500, 'Document processing failed', {
      cause,
      publicMessage: 'Internal server error occurred while processing the file',
    });
  }
}

export class EmptyQueryError extends ServiceError {
  constructor() {
    super('EMPTY_QUERY', 400, 'Search query cannot be empty');
  }
}

export class SearchUnavailableError extends ServiceError {
  constructor(cause: unknown) {
    super('SEARCH_UNAVAILABLE', 500, 'Corpus search failed', {
      cause,
      publicMessage: 'Search service is currently unavailable',
    });
  }
}

export class DocumentsUnavailableError extends ServiceError {
  constructor(cause: unknown) {
    super('DOCUMENTS_UNAVAILABLE', 500, 'Document listing failed', {
      cause,
      publicMessage: 'Could not retrieve documents',
    });
  }
}

export class MissingFileError extends ServiceError {
  constructor() {
    super('VALIDATION_ERROR', 400, 'file is required (multipart/form-data)');
  }
}
