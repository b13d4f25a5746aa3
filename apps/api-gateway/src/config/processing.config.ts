import { ConfigService } from '@nestjs/config';
import { DEFAULT_POLL_POLICY, ProcessingOptions } from '@docsense/processing';
import { readNumber } from './config.utils';

/**
 * Builds the orchestration core options from the environment.
 *
 * Keys:
 *   ANALYSIS_POLL_INITIAL_DELAY_MS     first wait between status queries
 *   ANALYSIS_POLL_MAX_DELAY_MS         cap on the backed-off wait
 *   ANALYSIS_POLL_BACKOFF_MULTIPLIER   growth factor per attempt (1 = fixed interval)
 *   ANALYSIS_POLL_MAX_TOTAL_WAIT_MS    wall-clock budget per operation
 *   ANALYSIS_POLL_MAX_ATTEMPTS         status query budget per operation
 *   ANALYSIS_POLL_MAX_FETCH_FAILURES   consecutive failed queries before giving up
 *   STATUS_RETENTION_MS                keep finished tasks this long (0 = forever)
 */
export function processingOptionsFactory(configService: ConfigService): ProcessingOptions {
  return {
    pollPolicy: {
      initialDelayMs: readNumber(
        configService,
        'ANALYSIS_POLL_INITIAL_DELAY_MS',
        DEFAULT_POLL_POLICY.initialDelayMs,
      ),
      maxDelayMs: readNumber(
        configService,
        'ANALYSIS_POLL_MAX_DELAY_MS',
        DEFAULT_POLL_POLICY.maxDelayMs,
      ),
      backoffMultiplier: readNumber(
        configService,
        'ANALYSIS_POLL_BACKOFF_MULTIPLIER',
        DEFAULT_POLL_POLICY.backoffMultiplier,
      ),
      maxTotalWaitMs: readNumber(
        configService,
        'ANALYSIS_POLL_MAX_TOTAL_WAIT_MS',
        DEFAULT_POLL_POLICY.maxTotalWaitMs,
      ),
      maxAttempts: readNumber(
        configService,
        'ANALYSIS_POLL_MAX_ATTEMPTS',
        DEFAULT_POLL_POLICY.maxAttempts,
      ),
      maxConsecutiveFetchFailures: readNumber(
        configService,
        'ANALYSIS_POLL_MAX_FETCH_FAILURES',
        DEFAULT_POLL_POLICY.maxConsecutiveFetchFailures,
      ),
      jitterRatio: DEFAULT_POLL_POLICY.jitterRatio,
    },
    retentionMs: readNumber(configService, 'STATUS_RETENTION_MS', 0),
  };
}
