import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DocumentsService } from './documents.service';
import { DocumentsController } from './documents.controller';

/**
 * DocumentsModule — upload and task management routes.
 *
 * DocumentOrchestrator comes from ProcessingModule, imported once in AppModule.
 */
@Module({
  imports: [ConfigModule],
  controllers: [DocumentsController],
  providers: [DocumentsService],
})
export class DocumentsModule {}
