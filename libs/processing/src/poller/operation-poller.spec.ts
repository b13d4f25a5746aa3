import { OperationPoller } from './operation-poller';
import { OperationStage } from '../enums/operation-stage.enum';
import {
  InvalidPollPolicyError,
  PollingError,
} from '../errors/processing.errors';
import { systemClock } from '../interfaces/clock.interface';
import { OperationStatus } from '../interfaces/operation.interface';
import { PollPolicy } from '../interfaces/poll-policy.interface';
import { FakeClock } from '../testing/fake-clock';

type Status = OperationStatus<string>;

const RUNNING: Status = { stage: OperationStage.RUNNING };

function policy(overrides: Partial<PollPolicy> = {}): PollPolicy {
  return {
    initialDelayMs: 100,
    maxDelayMs: 1_000,
    backoffMultiplier: 1,
    maxTotalWaitMs: 60_000,
    maxAttempts: 10,
    maxConsecutiveFetchFailures: 3,
    jitterRatio: 0,
    ...overrides,
  };
}

/** Replays `steps` in order; an Error entry is thrown instead of returned. */
function scripted(...steps: Array<Status | Error>) {
  let index = 0;
  return jest.fn(async (_signal?: AbortSignal): Promise<Status> => {
    const step = steps[Math.min(index, steps.length - 1)];
    index++;
    if (step instanceof Error) throw step;
    return step;
  });
}

describe('OperationPoller', () => {
  let clock: FakeClock;
  let poller: OperationPoller;

  beforeEach(() => {
    clock = new FakeClock();
    poller = new OperationPoller(clock);
  });

  it('times out after exactly maxAttempts while the operation keeps running', async () => {
    const fetchStatus = scripted(RUNNING);

    const outcome = await poller.poll(fetchStatus, policy({ maxAttempts: 3 }));

    expect(outcome).toEqual({ kind: 'timedOut', attempts: 3, elapsedMs: 200 });
    expect(fetchStatus).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([100, 100]);
  });

  it('returns on the second query without a delay after success', async () => {
    const fetchStatus = scripted(RUNNING, {
      stage: OperationStage.SUCCEEDED,
      payload: 'extracted',
    });

    const outcome = await poller.poll(fetchStatus, policy());

    expect(outcome).toEqual({ kind: 'succeeded', payload: 'extracted', attempts: 2 });
    expect(fetchStatus).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([100]);
  });

  it('reports a failed operation distinctly from a timeout', async () => {
    const fetchStatus = scripted({
      stage: OperationStage.FAILED,
      error: { code: 'InvalidContent', message: 'unreadable document' },
    });

    const outcome = await poller.poll(fetchStatus, policy());

    expect(outcome).toEqual({
      kind: 'failed',
      error: { code: 'InvalidContent', message: 'unreadable document' },
      attempts: 1,
    });
    expect(clock.sleeps).toEqual([]);
  });

  it('grows the delay by the multiplier and caps it at maxDelayMs', async () => {
    const fetchStatus = scripted(RUNNING);

    await poller.poll(
      fetchStatus,
      policy({ backoffMultiplier: 2, maxDelayMs: 350, maxAttempts: 5 }),
    );

    expect(clock.sleeps).toEqual([100, 200, 350, 350]);
  });

  it('clips the last delay to the wait budget and stops when it is spent', async () => {
    const fetchStatus = scripted(RUNNING);

    const outcome = await poller.poll(
      fetchStatus,
      policy({ maxTotalWaitMs: 250, maxAttempts: 100 }),
    );

    expect(outcome).toEqual({ kind: 'timedOut', attempts: 4, elapsedMs: 250 });
    expect(clock.sleeps).toEqual([100, 100, 50]);
  });

  it('retries transient query failures below the limit', async () => {
    const fetchStatus = scripted(
      new PollingError('connection reset'),
      new PollingError('connection reset'),
      { stage: OperationStage.SUCCEEDED, payload: 'late' },
    );

    const outcome = await poller.poll(fetchStatus, policy());

    expect(outcome).toEqual({ kind: 'succeeded', payload: 'late', attempts: 3 });
  });

  it('gives up with pollingError after too many consecutive query failures', async () => {
    const fetchStatus = scripted(new PollingError('HTTP 503'));

    const outcome = await poller.poll(fetchStatus, policy());

    expect(outcome.kind).toBe('pollingError');
    expect(outcome.attempts).toBe(3);
    expect(outcome.kind === 'pollingError' && outcome.error.message).toBe('HTTP 503');
    expect(fetchStatus).toHaveBeenCalledTimes(3);
  });

  it('resets the failure count after a successful query', async () => {
    const fetchStatus = scripted(
      new PollingError('blip'),
      new PollingError('blip'),
      RUNNING,
      new PollingError('blip'),
      new PollingError('blip'),
      { stage: OperationStage.SUCCEEDED, payload: 'done' },
    );

    const outcome = await poller.poll(fetchStatus, policy());

    expect(outcome).toEqual({ kind: 'succeeded', payload: 'done', attempts: 6 });
  });

  it('does not query at all when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchStatus = scripted(RUNNING);

    const outcome = await poller.poll(fetchStatus, policy(), controller.signal);

    expect(outcome).toEqual({ kind: 'cancelled', attempts: 0 });
    expect(fetchStatus).not.toHaveBeenCalled();
  });

  it('observes cancellation before the next delay', async () => {
    const controller = new AbortController();
    const fetchStatus = jest.fn(async (): Promise<Status> => {
      controller.abort();
      return RUNNING;
    });

    const outcome = await poller.poll(fetchStatus, policy(), controller.signal);

    expect(outcome).toEqual({ kind: 'cancelled', attempts: 1 });
    expect(clock.sleeps).toEqual([]);
  });

  it('reports a query aborted by the signal as cancelled, not as a query failure', async () => {
    const controller = new AbortController();
    let calls = 0;
    const fetchStatus = jest.fn(async (): Promise<Status> => {
      calls++;
      if (calls === 3) controller.abort();
      throw new PollingError(calls === 3 ? 'This operation was aborted' : 'HTTP 503');
    });

    const outcome = await poller.poll(fetchStatus, policy(), controller.signal);

    expect(outcome).toEqual({ kind: 'cancelled', attempts: 3 });
    expect(clock.sleeps).toEqual([100, 100]);
  });

  it('reports a cancel raised during the last allowed query as cancelled', async () => {
    const controller = new AbortController();
    let calls = 0;
    const fetchStatus = jest.fn(async (): Promise<Status> => {
      calls++;
      if (calls === 3) controller.abort();
      return RUNNING;
    });

    const outcome = await poller.poll(fetchStatus, policy({ maxAttempts: 3 }), controller.signal);

    expect(outcome).toEqual({ kind: 'cancelled', attempts: 3 });
    expect(fetchStatus).toHaveBeenCalledTimes(3);
  });

  it('passes the cancellation signal to every status query', async () => {
    const controller = new AbortController();
    const fetchStatus = scripted({ stage: OperationStage.SUCCEEDED, payload: 'ok' });

    await poller.poll(fetchStatus, policy(), controller.signal);

    expect(fetchStatus).toHaveBeenCalledWith(controller.signal);
  });

  it.each<[string, Partial<PollPolicy>]>([
    ['backoffMultiplier below 1', { backoffMultiplier: 0.5 }],
    ['zero attempts', { maxAttempts: 0 }],
    ['zero failure tolerance', { maxConsecutiveFetchFailures: 0 }],
    ['maxDelayMs below initialDelayMs', { maxDelayMs: 50 }],
    ['non-positive wait budget', { maxTotalWaitMs: 0 }],
    ['jitter above 1', { jitterRatio: 1.5 }],
  ])('rejects a policy with %s', async (_label, overrides) => {
    const fetchStatus = scripted(RUNNING);

    await expect(poller.poll(fetchStatus, policy(overrides))).rejects.toBeInstanceOf(
      InvalidPollPolicyError,
    );
    expect(fetchStatus).not.toHaveBeenCalled();
  });

  it('keeps jittered delays within the configured ratio', async () => {
    const random = jest.spyOn(Math, 'random').mockReturnValue(0.5);
    const fetchStatus = scripted(RUNNING);

    await poller.poll(fetchStatus, policy({ jitterRatio: 0.2, maxAttempts: 2 }));

    expect(clock.sleeps).toEqual([90]);
    random.mockRestore();
  });
});

describe('systemClock', () => {
  it('ends a sleep early when the signal aborts', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();

    const sleeping = systemClock.sleep(10_000, controller.signal);
    controller.abort();
    await sleeping;

    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });
});
