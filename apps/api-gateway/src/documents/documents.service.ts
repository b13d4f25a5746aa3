import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentInput, DocumentOrchestrator } from '@docsense/processing';
import { readNumber } from '../config/config.utils';
import { AnalyzeAcceptedResponseDto } from './dto/analyze-accepted-response.dto';
import { CancelDocumentResponseDto } from './dto/cancel-document-response.dto';
import { DocumentStatusResponseDto } from './dto/document-status-response.dto';
import {
  DocumentNotFoundException,
  FileTooLargeException,
  InvalidMimeTypeException,
  MissingFileException,
  isAllowedMimeType,
} from './exceptions/document.exceptions';

const BYTES_PER_MB = 1024 * 1024;

const DEFAULT_FILENAME = 'unknown.pdf';
const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * DocumentsService — HTTP-facing wrapper around the DocumentOrchestrator.
 *
 * Validates uploads (presence, MIME type, size) before anything reaches
 * the core, and maps task snapshots to response DTOs. Unknown ids become
 * DocumentNotFoundException (404).
 */
@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);
  private readonly maxFileSizeBytes: number;

  constructor(
    private readonly orchestrator: DocumentOrchestrator,
    private readonly configService: ConfigService,
  ) {
    this.maxFileSizeBytes =
      readNumber(this.configService, 'UPLOAD_MAX_FILE_SIZE_MB', 50) * BYTES_PER_MB;
  }

  /** Runs the whole pipeline and returns the terminal snapshot. */
  async analyze(file: Express.Multer.File | undefined): Promise<DocumentStatusResponseDto> {
    const input = this.toDocumentInput(file);
    const task = await this.orchestrator.submitBlocking(input);
    return DocumentStatusResponseDto.fromTask(task);
  }

  /** Starts the pipeline in the background and returns the new document id. */
  analyzeAsync(file: Express.Multer.File | undefined): AnalyzeAcceptedResponseDto {
    const input = this.toDocumentInput(file);
    const documentId = this.orchestrator.submitDetached(input);

    this.logger.log(`Document ${documentId} accepted for background processing`);
    return {
      documentId,
      status: 'queued',
      message: `Processing started. Poll GET /documents/${documentId} for status.`,
    };
  }

  getStatus(documentId: string): DocumentStatusResponseDto {
    const task = this.orchestrator.queryStatus(documentId);
    if (!task) {
      throw new DocumentNotFoundException(documentId);
    }
    return DocumentStatusResponseDto.fromTask(task);
  }

  cancel(documentId: string): CancelDocumentResponseDto {
    if (!this.orchestrator.queryStatus(documentId)) {
      throw new DocumentNotFoundException(documentId);
    }
    return { documentId, cancelled: this.orchestrator.cancel(documentId) };
  }

  async discard(documentId: string): Promise<void> {
    const discarded = await this.orchestrator.discard(documentId);
    if (!discarded) {
      throw new DocumentNotFoundException(documentId);
    }
  }

  // ── Private methods ──────────────────────────────────────

  /**
   * Validates the uploaded file and fills in a missing filename or
   * content type. Throws a typed HTTP exception on any validation failure.
   */
  private toDocumentInput(file: Express.Multer.File | undefined): DocumentInput {
    if (!file || !file.buffer || file.buffer.length === 0) {
      throw new MissingFileException();
    }

    const contentType = file.mimetype || DEFAULT_CONTENT_TYPE;
    if (!isAllowedMimeType(contentType)) {
      throw new InvalidMimeTypeException(contentType);
    }

    if (file.buffer.length > this.maxFileSizeBytes) {
      throw new FileTooLargeException(this.maxFileSizeBytes / BYTES_PER_MB);
    }

    return {
      bytes: file.buffer,
      filename: file.originalname || DEFAULT_FILENAME,
      contentType,
    };
  }
}
