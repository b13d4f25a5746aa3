import { Module } from '@nestjs/common';
import { ProgressController } from './progress.controller';
import { ProgressSseService } from './progress-sse.service';

/**
 * ProgressModule — SSE progress streaming.
 *
 * StatusRegistry comes from ProcessingModule, registered globally in AppModule.
 */
@Module({
  controllers: [ProgressController],
  providers: [ProgressSseService],
})
export class ProgressModule {}
