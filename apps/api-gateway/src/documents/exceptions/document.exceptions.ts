import { HttpException, HttpStatus } from '@nestjs/common';

/** Allowed MIME types for document upload. */
export const ALLOWED_MIME_TYPES = [
  'application/pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'application/msword',
  'image/png',
  'image/jpeg',
  'image/tiff',
] as const;

export type AllowedMimeType = (typeof ALLOWED_MIME_TYPES)[number];

export function isAllowedMimeType(mimeType: string): mimeType is AllowedMimeType {
  return ALLOWED_MIME_TYPES.some((allowed) => allowed === mimeType);
}

/**
 * Thrown when the uploaded file's MIME type is not on the allowlist.
 * Maps to HTTP 415 Unsupported Media Type.
 */
export class InvalidMimeTypeException extends HttpException {
  constructor(receivedMimeType: string) {
    super(
      {
        statusCode: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
        error: 'Unsupported Media Type',
        message: `File type "${receivedMimeType}" is not supported. Allowed types: ${ALLOWED_MIME_TYPES.join(', ')}`,
      },
      HttpStatus.UNSUPPORTED_MEDIA_TYPE,
    );
  }
}

/**
 * Thrown when no file, or an empty one, is attached to the upload request.
 * Maps to HTTP 400 Bad Request.
 */
export class MissingFileException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: 'A non-empty file must be attached to the "file" multipart field',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the uploaded file exceeds the configured size limit.
 * Maps to HTTP 413 Content Too Large.
 */
export class FileTooLargeException extends HttpException {
  constructor(maxSizeMb: number) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        message: `File exceeds the maximum allowed size of ${maxSizeMb} MB`,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}

/**
 * Thrown for a document id this process does not know: never submitted,
 * discarded, evicted, or lost in a restart.
 * Maps to HTTP 404 Not Found.
 */
export class DocumentNotFoundException extends HttpException {
  constructor(documentId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Document ${documentId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
