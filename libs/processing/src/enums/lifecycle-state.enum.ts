/**
 * Lifecycle state of a document task in the extraction pipeline.
 *
 * Transitions:
 *   QUEUED → UPLOADING → UPLOADED → SUBMITTING → SUBMITTED → POLLING → COMPLETED
 *   any non-terminal state → FAILED
 */
export enum LifecycleState {
  /** Task registered, nothing sent anywhere yet */
  QUEUED = 'queued',

  /** Bytes are being written to object storage */
  UPLOADING = 'uploading',

  /** Object stored; storageLocation is set */
  UPLOADED = 'uploaded',

  /** Analysis request in flight */
  SUBMITTING = 'submitting',

  /** Analysis accepted; operationHandle is set */
  SUBMITTED = 'submitted',

  /** Waiting for the long-running analysis operation to finish */
  POLLING = 'polling',

  /** Extraction succeeded (result.payload is set) */
  COMPLETED = 'completed',

  /** Task failed (result.error carries the kind and cause) */
  FAILED = 'failed',
}

/** Position of each state on the success path. FAILED ranks after every state. */
export const LIFECYCLE_RANK: Readonly<Record<LifecycleState, number>> = {
  [LifecycleState.QUEUED]: 0,
  [LifecycleState.UPLOADING]: 1,
  [LifecycleState.UPLOADED]: 2,
  [LifecycleState.SUBMITTING]: 3,
  [LifecycleState.SUBMITTED]: 4,
  [LifecycleState.POLLING]: 5,
  [LifecycleState.COMPLETED]: 6,
  [LifecycleState.FAILED]: 6,
};
