export type {
  DocumentTask,
  DocumentInput,
  ExtractedField,
  ExtractionPayload,
  TaskError,
  TaskResult,
} from './document-task.interface';
export type {
  OperationError,
  OperationStatus,
  OperationOutcome,
  FetchStatus,
} from './operation.interface';
export { DEFAULT_POLL_POLICY } from './poll-policy.interface';
export type { PollPolicy } from './poll-policy.interface';
export type {
  StorageClient,
  AnalysisClient,
  StoredObject,
} from './collaborators.interface';
export { systemClock } from './clock.interface';
export type { Clock } from './clock.interface';
export type { ProcessingOptions } from './processing-options.interface';
