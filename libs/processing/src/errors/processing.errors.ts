import { FailureKind } from '../enums/failure-kind.enum';
import { LifecycleState } from '../enums/lifecycle-state.enum';

/**
 * Base class for every failure the pipeline turns into a FAILED task.
 * The kind ends up in `result.error.kind`.
 */
export abstract class ProcessingError extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class StorageError extends ProcessingError {
  readonly kind = FailureKind.STORAGE_ERROR;
}

export class SubmissionError extends ProcessingError {
  readonly kind = FailureKind.SUBMISSION_ERROR;
}

/** Transient failure of a single status query. Retried by OperationPoller. */
export class PollingError extends ProcessingError {
  readonly kind = FailureKind.POLLING_ERROR;
}

export class AnalysisFailedError extends ProcessingError {
  readonly kind = FailureKind.ANALYSIS_FAILED;
}

export class OperationTimedOutError extends ProcessingError {
  readonly kind = FailureKind.TIMED_OUT;
}

export class TaskCancelledError extends ProcessingError {
  readonly kind = FailureKind.CANCELLED;

  constructor(taskId: string) {
    super(`Task ${taskId} was cancelled`);
  }
}

/**
 * Raised by DocumentLifecycle.apply() for an illegal edge or a missing payload.
 * Never expected in correct code; the orchestrator fails the task with it.
 */
export class InvalidTransitionError extends ProcessingError {
  readonly kind = FailureKind.INVALID_TRANSITION;

  constructor(
    readonly from: LifecycleState,
    readonly to: LifecycleState,
    reason?: string,
  ) {
    super(
      `Illegal lifecycle transition ${from} → ${to}` +
        (reason ? `: ${reason}` : ''),
    );
  }
}

/**
 * Thrown synchronously for structurally invalid arguments, before any task exists.
 */
export class InvalidDocumentInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDocumentInputError';
  }
}

export class InvalidPollPolicyError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPollPolicyError';
  }
}
