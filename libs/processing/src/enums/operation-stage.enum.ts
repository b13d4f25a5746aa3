/** Stage reported by an external long-running operation. */
export enum OperationStage {
  RUNNING = 'running',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
}
