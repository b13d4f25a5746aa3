import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ProcessingModule } from '@docsense/processing';
import { AnalysisModule } from './analysis/analysis.module';
import { AnalysisService } from './analysis/analysis.service';
import { processingOptionsFactory } from './config/processing.config';
import { DocumentsModule } from './documents/documents.module';
import { HealthModule } from './health/health.module';
import { ProgressModule } from './progress/progress.module';
import { StorageModule } from './storage/storage.module';
import { StorageService } from './storage/storage.service';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Orchestration core ────────────────────────────────
    ProcessingModule.forRootAsync({
      imports: [StorageModule, AnalysisModule],
      storage: StorageService,
      analysis: AnalysisService,
      inject: [ConfigService],
      useFactory: processingOptionsFactory,
      isGlobal: true,
    }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    DocumentsModule,
    ProgressModule,
  ],
})
export class AppModule {}
