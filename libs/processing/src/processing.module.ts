import {
  DynamicModule,
  FactoryProvider,
  Module,
  ModuleMetadata,
  Provider,
  Type,
} from '@nestjs/common';
import { ProcessingOptions } from './interfaces/processing-options.interface';
import {
  AnalysisClient,
  StorageClient,
} from './interfaces/collaborators.interface';
import { DocumentOrchestrator } from './orchestrator/document-orchestrator.service';
import { OperationPoller } from './poller/operation-poller';
import { StatusRegistry } from './registry/status-registry';
import {
  ANALYSIS_CLIENT,
  PROCESSING_OPTIONS,
  STORAGE_CLIENT,
} from './processing.constants';

export interface ProcessingModuleAsyncOptions {
  /** Modules that export the storage and analysis adapters and anything the factory injects */
  imports?: ModuleMetadata['imports'];
  storage: Type<StorageClient>;
  analysis: Type<AnalysisClient>;
  inject?: FactoryProvider<ProcessingOptions>['inject'];
  useFactory: FactoryProvider<ProcessingOptions>['useFactory'];
  /** Extra providers, e.g. a PROCESSING_CLOCK override */
  extraProviders?: Provider[];
  /** Register the exports globally, as ConfigModule's isGlobal does */
  isGlobal?: boolean;
}

/**
 * ProcessingModule — the document orchestration core as a NestJS module.
 *
 * Usage:
 *   ProcessingModule.forRootAsync({
 *     imports: [StorageModule, AnalysisModule],
 *     storage: StorageService,
 *     analysis: AnalysisService,
 *     inject: [ConfigService],
 *     useFactory: (config: ConfigService) => ({ pollPolicy, retentionMs }),
 *     isGlobal: true,
 *   })
 *
 * Exports:
 *   - DocumentOrchestrator: submitBlocking / submitDetached / queryStatus / cancel / discard
 *   - StatusRegistry: watch(id) for progress streaming
 *
 * The adapters are bound with useExisting, so the instance the feature module
 * exports is the one the orchestrator calls.
 */
@Module({})
export class ProcessingModule {
  static forRootAsync(options: ProcessingModuleAsyncOptions): DynamicModule {
    const optionsProvider: FactoryProvider<ProcessingOptions> = {
      provide: PROCESSING_OPTIONS,
      inject: options.inject ?? [],
      useFactory: options.useFactory,
    };

    return {
      module: ProcessingModule,
      imports: options.imports ?? [],
      providers: [
        optionsProvider,
        { provide: STORAGE_CLIENT, useExisting: options.storage },
        { provide: ANALYSIS_CLIENT, useExisting: options.analysis },
        ...(options.extraProviders ?? []),
        OperationPoller,
        StatusRegistry,
        DocumentOrchestrator,
      ],
      exports: [DocumentOrchestrator, StatusRegistry],
      global: options.isGlobal ?? false,
    };
  }
}
