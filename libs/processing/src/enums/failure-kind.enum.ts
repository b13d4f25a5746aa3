/**
 * Kind of failure recorded in `result.error.kind` on a FAILED task.
 */
export enum FailureKind {
  /** Object storage rejected or failed the upload */
  STORAGE_ERROR = 'StorageError',

  /** The analysis service did not accept the document */
  SUBMISSION_ERROR = 'SubmissionError',

  /** Status queries kept failing until the consecutive-failure budget ran out */
  POLLING_ERROR = 'PollingError',

  /** The analysis operation itself reported failure */
  ANALYSIS_FAILED = 'AnalysisFailed',

  /** Polling budget exhausted while the operation was still running */
  TIMED_OUT = 'TimedOut',

  /** Caller abandoned the task */
  CANCELLED = 'Cancelled',

  /** Internal contract violation; indicates a defect */
  INVALID_TRANSITION = 'InvalidTransitionError',
}
