import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { OperationStage } from '../enums/operation-stage.enum';
import { InvalidPollPolicyError } from '../errors/processing.errors';
import { Clock, systemClock } from '../interfaces/clock.interface';
import {
  FetchStatus,
  OperationOutcome,
  OperationStatus,
} from '../interfaces/operation.interface';
import { PollPolicy } from '../interfaces/poll-policy.interface';
import { PROCESSING_CLOCK } from '../processing.constants';

/**
 * OperationPoller — drives an external long-running operation to a terminal stage.
 *
 * Loop:
 *   1. Stop with `cancelled` if the signal has been raised
 *   2. Query the status (one attempt)
 *   3. SUCCEEDED / FAILED → return at once, no trailing delay
 *   4. RUNNING, or a failed query below the consecutive-failure limit →
 *      stop with `cancelled` if the signal was raised during the query,
 *      then with `timedOut` if maxAttempts or maxTotalWaitMs is spent,
 *      otherwise sleep and go to 1
 *
 * A query that fails after the signal was raised counts as a cancel, not as
 * a failed query.
 *
 * Delays start at initialDelayMs and grow by backoffMultiplier up to
 * maxDelayMs. The last sleep is clipped to the remaining wait budget.
 *
 * Holds no per-operation state, so one instance serves every task.
 */
@Injectable()
export class OperationPoller {
  private readonly logger = new Logger(OperationPoller.name);
  private readonly clock: Clock;

  constructor(@Optional() @Inject(PROCESSING_CLOCK) clock?: Clock) {
    this.clock = clock ?? systemClock;
  }

  async poll<T>(
    fetchStatus: FetchStatus<T>,
    policy: PollPolicy,
    signal?: AbortSignal,
  ): Promise<OperationOutcome<T>> {
    assertValidPolicy(policy);

    const startedAt = this.clock.now();
    let attempts = 0;
    let consecutiveFailures = 0;
    let delayMs = policy.initialDelayMs;

    for (;;) {
      if (signal?.aborted) {
        return { kind: 'cancelled', attempts };
      }

      attempts++;
      let status: OperationStatus<T> | null = null;

      try {
        status = await fetchStatus(signal);
        consecutiveFailures = 0;
      } catch (error) {
        // An aborted query surfaces as a failed query; report it as the cancel it is
        if (signal?.aborted) {
          return { kind: 'cancelled', attempts };
        }
        const cause = error instanceof Error ? error : new Error(String(error));
        consecutiveFailures++;
        this.logger.warn(
          `Status query failed (attempt ${attempts}, ` +
            `${consecutiveFailures}/${policy.maxConsecutiveFetchFailures} in a row): ${cause.message}`,
        );
        if (consecutiveFailures >= policy.maxConsecutiveFetchFailures) {
          return { kind: 'pollingError', error: cause, attempts };
        }
      }

      if (status?.stage === OperationStage.SUCCEEDED) {
        return { kind: 'succeeded', payload: status.payload, attempts };
      }
      if (status?.stage === OperationStage.FAILED) {
        return { kind: 'failed', error: status.error, attempts };
      }

      if (signal?.aborted) {
        return { kind: 'cancelled', attempts };
      }

      const elapsedMs = this.clock.now() - startedAt;
      if (attempts >= policy.maxAttempts || elapsedMs >= policy.maxTotalWaitMs) {
        return { kind: 'timedOut', attempts, elapsedMs };
      }

      const waitMs = Math.min(
        this.withJitter(delayMs, policy.jitterRatio),
        policy.maxTotalWaitMs - elapsedMs,
      );
      this.logger.verbose(`Operation still running; next status query in ${waitMs} ms`);
      await this.clock.sleep(waitMs, signal);

      delayMs = Math.min(delayMs * policy.backoffMultiplier, policy.maxDelayMs);
    }
  }

  private withJitter(delayMs: number, jitterRatio: number): number {
    if (jitterRatio <= 0) return delayMs;
    return Math.round(delayMs * (1 - jitterRatio * Math.random()));
  }
}

function assertValidPolicy(policy: PollPolicy): void {
  if (!(policy.backoffMultiplier >= 1)) {
    throw new InvalidPollPolicyError('backoffMultiplier must be >= 1');
  }
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new InvalidPollPolicyError('maxAttempts must be a positive integer');
  }
  if (
    !Number.isInteger(policy.maxConsecutiveFetchFailures) ||
    policy.maxConsecutiveFetchFailures < 1
  ) {
    throw new InvalidPollPolicyError(
      'maxConsecutiveFetchFailures must be a positive integer',
    );
  }
  if (policy.initialDelayMs < 0 || policy.maxDelayMs < policy.initialDelayMs) {
    throw new InvalidPollPolicyError(
      'delays must satisfy 0 <= initialDelayMs <= maxDelayMs',
    );
  }
  if (!(policy.maxTotalWaitMs > 0)) {
    throw new InvalidPollPolicyError('maxTotalWaitMs must be positive');
  }
  if (policy.jitterRatio < 0 || policy.jitterRatio > 1) {
    throw new InvalidPollPolicyError('jitterRatio must be within [0, 1]');
  }
}
