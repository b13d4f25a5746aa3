/**
 * Backoff and budget settings for OperationPoller.
 *
 * Whichever of maxTotalWaitMs / maxAttempts triggers first ends the loop.
 */
export interface PollPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  /** Must be >= 1 */
  backoffMultiplier: number;
  maxTotalWaitMs: number;
  maxAttempts: number;
  /** Consecutive failed status queries tolerated before giving up */
  maxConsecutiveFetchFailures: number;
  /** Fraction of each delay that may be randomly shaved off, in [0, 1] */
  jitterRatio: number;
}

/** First poll after 2 s, backing off to 10 s; at most 60 attempts or 5 minutes. */
export const DEFAULT_POLL_POLICY: Readonly<PollPolicy> = {
  initialDelayMs: 2_000,
  maxDelayMs: 10_000,
  backoffMultiplier: 1.5,
  maxTotalWaitMs: 5 * 60 * 1000,
  maxAttempts: 60,
  maxConsecutiveFetchFailures: 3,
  jitterRatio: 0,
};
