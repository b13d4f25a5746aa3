/**
 * How DocumentOrchestrator.run() hands control back to the caller.
 */
export enum ExecutionMode {
  /** Resolve only once the task is terminal */
  BLOCKING = 'blocking',

  /** Resolve with the QUEUED snapshot; the pipeline continues in the background */
  DETACHED = 'detached',
}
