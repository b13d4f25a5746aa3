import { OperationStage } from '../enums/operation-stage.enum';

/** Error reported by the external operation itself (not a transport failure). */
export interface OperationError {
  code?: string;
  message: string;
}

export type OperationStatus<T> =
  | { stage: OperationStage.RUNNING }
  | { stage: OperationStage.SUCCEEDED; payload: T }
  | { stage: OperationStage.FAILED; error: OperationError };

/**
 * Result of driving an operation with OperationPoller.
 *
 * `timedOut` means the operation never reported a terminal stage within the
 * budget; `pollingError` means the status query itself kept failing.
 */
export type OperationOutcome<T> =
  | { kind: 'succeeded'; payload: T; attempts: number }
  | { kind: 'failed'; error: OperationError; attempts: number }
  | { kind: 'timedOut'; attempts: number; elapsedMs: number }
  | { kind: 'pollingError'; error: Error; attempts: number }
  | { kind: 'cancelled'; attempts: number };

export type FetchStatus<T> = (signal?: AbortSignal) => Promise<OperationStatus<T>>;
