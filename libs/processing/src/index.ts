/**
 * @docsense/processing
 *
 * Orchestration core of the document extraction pipeline.
 *
 * Exports:
 *   - ProcessingModule.forRootAsync()  — wire the core into a NestJS app
 *   - DocumentOrchestrator             — run documents, query/cancel/discard tasks
 *   - StatusRegistry                   — latest snapshot per task, watch(id)
 *   - OperationPoller                  — bounded polling of long-running operations
 *   - DocumentLifecycle                — states and legal transitions
 *   - Collaborator contracts, error taxonomy, injection tokens
 */
export { ProcessingModule } from './processing.module';
export type { ProcessingModuleAsyncOptions } from './processing.module';
export { DocumentOrchestrator } from './orchestrator/document-orchestrator.service';
export { StatusRegistry } from './registry/status-registry';
export { OperationPoller } from './poller/operation-poller';
export { DocumentLifecycle } from './lifecycle/document-lifecycle';
export type { TransitionPayload } from './lifecycle/document-lifecycle';
export * from './enums';
export * from './errors';
export * from './interfaces';
export {
  STORAGE_CLIENT,
  ANALYSIS_CLIENT,
  PROCESSING_OPTIONS,
  PROCESSING_CLOCK,
} from './processing.constants';
