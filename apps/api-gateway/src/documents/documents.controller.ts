import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { DocumentsService } from './documents.service';
import { AnalyzeAcceptedResponseDto } from './dto/analyze-accepted-response.dto';
import { CancelDocumentResponseDto } from './dto/cancel-document-response.dto';
import { DocumentStatusResponseDto } from './dto/document-status-response.dto';

/**
 * Multer configuration: memory storage so the buffer stays in RAM and
 * flows directly to the orchestrator without a temp file on disk.
 *
 * The primary size limit is enforced in DocumentsService with a
 * descriptive error; this is the hard cap at the Multer layer.
 */
const MULTER_OPTIONS = {
  storage: memoryStorage(),
  limits: {
    fileSize: 100 * 1024 * 1024,
  },
};

/**
 * REST controller for document extraction.
 *
 * Routes:
 *   POST   /documents/analyze        — run extraction, wait for the result
 *   POST   /documents/analyze/async  — start extraction, return the id (202)
 *   GET    /documents/:id            — latest status snapshot
 *   POST   /documents/:id/cancel     — request cancellation (202)
 *   DELETE /documents/:id            — cancel, delete the stored file, forget (204)
 *
 * Error responses:
 *   400 — No file attached, or an id that is not a UUID
 *   404 — Unknown document id
 *   413 — File exceeds size limit
 *   415 — Unsupported MIME type
 */
@Controller('documents')
export class DocumentsController {
  private readonly logger = new Logger(DocumentsController.name);

  constructor(private readonly documentsService: DocumentsService) {}

  /**
   * Extraction failures are part of the 200 body (`state: "failed"`,
   * `error.kind`), not HTTP errors.
   */
  @Post('analyze')
  @UseInterceptors(FileInterceptor('file', MULTER_OPTIONS))
  @HttpCode(HttpStatus.OK)
  analyze(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<DocumentStatusResponseDto> {
    this.logger.log(
      `Analyze request: file="${file?.originalname ?? 'none'}", size=${file?.size ?? 0}`,
    );
    return this.documentsService.analyze(file);
  }

  @Post('analyze/async')
  @UseInterceptors(FileInterceptor('file', MULTER_OPTIONS))
  @HttpCode(HttpStatus.ACCEPTED)
  analyzeAsync(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): AnalyzeAcceptedResponseDto {
    this.logger.log(
      `Async analyze request: file="${file?.originalname ?? 'none'}", size=${file?.size ?? 0}`,
    );
    return this.documentsService.analyzeAsync(file);
  }

  @Get(':id')
  getStatus(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
  ): DocumentStatusResponseDto {
    return this.documentsService.getStatus(id);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.ACCEPTED)
  cancel(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
  ): CancelDocumentResponseDto {
    return this.documentsService.cancel(id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  discard(@Param('id', new ParseUUIDPipe({ version: '4' })) id: string): Promise<void> {
    return this.documentsService.discard(id);
  }
}
