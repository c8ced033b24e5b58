// src/errors.ts
import type { FileRecord } from './models/file.model';

/** Base class for every error raised by this package. */
export class DocSearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocSearchError';
  }
}

/** Missing or rejected API key (no key configured, HTTP 401 or 403). */
export class AuthenticationError extends DocSearchError {
  constructor(message: string = 'Authentication failed') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends DocSearchError {
  constructor(message: string = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Any other failed exchange with the API or the storage provider. */
export class APIError extends DocSearchError {
  readonly statusCode?: number;
  readonly responseBody?: string;

  constructor(
    message: string,
    details: { statusCode?: number; responseBody?: string; cause?: unknown } = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'APIError';
    this.statusCode = details.statusCode;
    this.responseBody = details.responseBody;
  }
}

/** No response was received: DNS, refused connection, reset or request timeout. */
export class ConnectionError extends APIError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'ConnectionError';
  }
}

/** The local file to upload does not exist. Raised before any request is sent. */
export class FileNotFoundError extends DocSearchError {
  readonly path: string;

  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = 'FileNotFoundError';
    this.path = path;
  }
}

/** The processing pipeline reported a `*_failed` status. */
export class ProcessingError extends DocSearchError {
  readonly file: FileRecord;

  constructor(file: FileRecord) {
    super(`File processing failed with status ${file.status}: ${file.errorMessage || 'Unknown error'}`);
    this.name = 'ProcessingError';
    this.file = file;
  }
}

/** The poll loop ran past its deadline without reaching a terminal status. */
export class PollTimeoutError extends DocSearchError {
  readonly file: FileRecord;

  constructor(file: FileRecord) {
    super(`Timeout waiting for file to be ready. Current status: ${file.status}`);
    this.name = 'PollTimeoutError';
    this.file = file;
  }
}

export class ValidationError extends DocSearchError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
