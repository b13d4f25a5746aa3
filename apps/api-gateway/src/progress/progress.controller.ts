import { Controller, Get, Logger, Param, ParseUUIDPipe, Req, Res } from '@nestjs/common';
import { Request, Response } from 'express';
import { ProgressSseService } from './progress-sse.service';

/**
 * ProgressController — SSE endpoint for streaming document status.
 *
 * Route: GET /documents/:id/progress
 *
 * Each snapshot is one event:
 *   id: 1
 *   event: progress
 *   data: {"documentId":"...","state":"polling","percent":83,"message":"..."}
 *
 * The stream terminates when the task reaches completed or failed, the
 * client disconnects, or the max stream lifetime (5 min) is exceeded.
 * An unknown id gets a 404 JSON response and no stream.
 */
@Controller('documents')
export class ProgressController {
  private readonly logger = new Logger(ProgressController.name);

  constructor(private readonly progressSseService: ProgressSseService) {}

  @Get(':id/progress')
  streamProgress(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
    @Req() req: Request,
    @Res() res: Response,
  ): void {
    this.logger.log(`SSE connection request for document ${id} from ${req.ip ?? 'unknown'}`);
    this.progressSseService.streamProgress(id, res);
  }
}
