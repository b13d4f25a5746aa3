import { FailureKind } from '../enums/failure-kind.enum';
import { LifecycleState } from '../enums/lifecycle-state.enum';

/** One field pulled out of a document by the analysis service. */
export interface ExtractedField {
  name: string;
  value: unknown;
  /** Confidence score in [0, 1], or null when the analyzer does not report one */
  confidence: number | null;
}

export interface ExtractionPayload {
  fields: ExtractedField[];
  /** Analyzer response the fields were read from, when the adapter keeps it */
  rawResult?: Record<string, unknown>;
}

export interface TaskError {
  kind: FailureKind;
  message: string;
  /** Message of the underlying error, when there was one */
  cause?: string;
}

export type TaskResult =
  | { status: 'succeeded'; payload: ExtractionPayload }
  | { status: 'failed'; error: TaskError };

/**
 * DocumentTask — immutable snapshot of one document's trip through the pipeline.
 *
 * Invariants:
 *   - storageLocation and storageKey are set iff the task reached UPLOADED
 *   - operationHandle is set iff the task reached SUBMITTED
 *   - result is set iff state is COMPLETED or FAILED, and never changes after
 *   - updatedAt advances on every transition
 */
export interface DocumentTask {
  readonly id: string;
  readonly state: LifecycleState;
  readonly sourceFilename: string;
  readonly contentType: string;
  readonly sizeBytes: number;
  readonly storageLocation?: string;
  readonly storageKey?: string;
  readonly operationHandle?: string;
  readonly result?: TaskResult;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Raw document handed to the orchestrator by the route layer. */
export interface DocumentInput {
  bytes: Buffer;
  filename: string;
  contentType: string;
}
