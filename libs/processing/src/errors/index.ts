export {
  ProcessingError,
  StorageError,
  SubmissionError,
  PollingError,
  AnalysisFailedError,
  OperationTimedOutError,
  TaskCancelledError,
  InvalidTransitionError,
  InvalidDocumentInputError,
  InvalidPollPolicyError,
} from './processing.errors';
