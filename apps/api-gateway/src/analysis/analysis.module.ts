import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnalysisService } from './analysis.service';

@Module({
  imports: [ConfigModule],
  providers: [AnalysisService],
  exports: [AnalysisService],
})
export class AnalysisModule {}
