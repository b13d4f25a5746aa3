import { PollPolicy } from './poll-policy.interface';

export interface ProcessingOptions {
  pollPolicy: PollPolicy;
  /**
   * How long terminal tasks stay in the StatusRegistry.
   * 0 keeps them for the lifetime of the process.
   */
  retentionMs: number;
  /** Interval of the retention sweep; defaults to retentionMs / 2, at least 1 s */
  sweepIntervalMs?: number;
}
