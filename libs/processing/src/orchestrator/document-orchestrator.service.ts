import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import { ExecutionMode } from '../enums/execution-mode.enum';
import { FailureKind } from '../enums/failure-kind.enum';
import { LifecycleState } from '../enums/lifecycle-state.enum';
import {
  AnalysisFailedError,
  InvalidDocumentInputError,
  OperationTimedOutError,
  PollingError,
  ProcessingError,
  StorageError,
  SubmissionError,
  TaskCancelledError,
} from '../errors/processing.errors';
import {
  AnalysisClient,
  StorageClient,
} from '../interfaces/collaborators.interface';
import {
  DocumentInput,
  DocumentTask,
  ExtractionPayload,
  TaskError,
} from '../interfaces/document-task.interface';
import { OperationOutcome } from '../interfaces/operation.interface';
import { ProcessingOptions } from '../interfaces/processing-options.interface';
import {
  DocumentLifecycle,
  TransitionPayload,
} from '../lifecycle/document-lifecycle';
import { OperationPoller } from '../poller/operation-poller';
import { StatusRegistry } from '../registry/status-registry';
import {
  ANALYSIS_CLIENT,
  PROCESSING_OPTIONS,
  STORAGE_CLIENT,
} from '../processing.constants';

interface InFlightTask {
  controller: AbortController;
  pipeline: Promise<DocumentTask>;
}

type FailureErrorClass = new (message: string, options?: { cause?: unknown }) => ProcessingError;

/**
 * DocumentOrchestrator — drives one document from raw bytes to a terminal task.
 *
 * Pipeline (strictly sequential per task):
 *   1. QUEUED      — task created and registered
 *   2. UPLOADING   → Storage.upload()          → UPLOADED (storageLocation)
 *   3. SUBMITTING  → Analysis.submit(url)      → SUBMITTED (operationHandle)
 *   4. POLLING     → OperationPoller over Analysis.fetchStatus() → COMPLETED
 *
 * Every snapshot is written to the StatusRegistry as soon as it exists, in
 * both modes, so status queries see intermediate states.
 *
 * Failure invariants:
 *   - A collaborator failure at any step becomes a FAILED transition with the
 *     matching FailureKind; nothing is thrown past run()
 *   - Upload and submission are never retried (a retried upload could store
 *     the file twice); the caller resubmits as a new task
 *   - An InvalidTransitionError fails the task with kind InvalidTransitionError
 *   - Only structurally invalid input throws, synchronously, before a task exists
 */
@Injectable()
export class DocumentOrchestrator implements OnApplicationShutdown {
  private readonly logger = new Logger(DocumentOrchestrator.name);

  /** Pipelines that have not settled yet, with their cancellation handles */
  private readonly inFlight = new Map<string, InFlightTask>();

  constructor(
    @Inject(STORAGE_CLIENT)
    private readonly storage: StorageClient,

    @Inject(ANALYSIS_CLIENT)
    private readonly analysis: AnalysisClient,

    private readonly registry: StatusRegistry,
    private readonly poller: OperationPoller,

    @Inject(PROCESSING_OPTIONS)
    private readonly options: ProcessingOptions,
  ) {}

  // ── Public API ────────────────────────────────────────────

  /**
   * Runs the full lifecycle for one document.
   *
   * BLOCKING resolves with the terminal snapshot; DETACHED resolves with the
   * QUEUED snapshot while the pipeline continues in the background.
   */
  run(input: DocumentInput, mode: ExecutionMode): Promise<DocumentTask> {
    this.assertValidInput(input);
    const { task, pipeline } = this.launch(input, mode);

    if (mode === ExecutionMode.BLOCKING) {
      return pipeline;
    }

    this.detach(task, pipeline);
    return Promise.resolve(task);
  }

  /** Resolves once the task is terminal. */
  submitBlocking(input: DocumentInput): Promise<DocumentTask> {
    return this.run(input, ExecutionMode.BLOCKING);
  }

  /** Registers the task and returns its id; processing continues off the calling path. */
  submitDetached(input: DocumentInput): string {
    this.assertValidInput(input);
    const { task, pipeline } = this.launch(input, ExecutionMode.DETACHED);
    this.detach(task, pipeline);
    return task.id;
  }

  /** Latest snapshot, or null for an id this process has never seen (or has evicted). */
  queryStatus(id: string): DocumentTask | null {
    this.assertValidId(id);
    return this.registry.get(id);
  }

  /**
   * Raises the cancellation signal of a running task. Best effort: calls
   * already issued to the collaborators are not interrupted.
   *
   * @returns false when the task is unknown or already terminal
   */
  cancel(id: string): boolean {
    this.assertValidId(id);
    const entry = this.inFlight.get(id);
    if (!entry || entry.controller.signal.aborted) return false;

    this.logger.log(`Cancellation requested for task ${id}`);
    entry.controller.abort();
    return true;
  }

  /**
   * Cleanup path: cancels the task if running and waits for its pipeline to
   * settle, then deletes its stored object and evicts it from the registry.
   * Storage failures are logged, not thrown.
   *
   * @returns false when the id is unknown
   */
  async discard(id: string): Promise<boolean> {
    if (!this.queryStatus(id)) return false;

    const entry = this.inFlight.get(id);
    this.cancel(id);
    const task = entry ? await entry.pipeline : this.registry.get(id);
    this.registry.delete(id);
    if (!task) return false;

    if (task.storageKey) {
      try {
        await this.storage.delete(task.storageKey);
        this.logger.log(`Deleted stored object ${task.storageKey} of task ${id}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Failed to delete stored object ${task.storageKey} of task ${id}: ${message}`,
        );
      }
    }

    this.logger.log(`Task ${id} discarded`);
    return true;
  }

  onApplicationShutdown(): void {
    if (this.inFlight.size === 0) return;

    this.logger.warn(`Shutting down with ${this.inFlight.size} task(s) in flight; cancelling`);
    for (const { controller } of this.inFlight.values()) {
      controller.abort();
    }
  }

  // ── Pipeline ──────────────────────────────────────────────

  /** Creates and registers the QUEUED task, then starts its pipeline. */
  private launch(
    input: DocumentInput,
    mode: ExecutionMode,
  ): { task: DocumentTask; pipeline: Promise<DocumentTask> } {
    const task = DocumentLifecycle.createTask(randomUUID(), {
      sourceFilename: input.filename,
      contentType: input.contentType,
      sizeBytes: input.bytes.length,
    });
    this.registry.put(task);

    this.logger.log(
      `Task ${task.id} queued (${mode}): "${input.filename}", ` +
        `${input.contentType}, ${input.bytes.length} bytes`,
    );

    // Start on the next turn of the event loop so the caller gets control back first
    const controller = new AbortController();
    const pipeline = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.execute(task, input, controller.signal))
      .finally(() => {
        this.inFlight.delete(task.id);
      });
    this.inFlight.set(task.id, { controller, pipeline });

    return { task, pipeline };
  }

  /** Fire-and-forget: the outcome is observable through queryStatus(). */
  private detach(task: DocumentTask, pipeline: Promise<DocumentTask>): void {
    pipeline.catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(
        `Unhandled error in detached pipeline for task ${task.id}: ${message}`,
      );
    });
  }

  private async execute(
    queued: DocumentTask,
    input: DocumentInput,
    signal: AbortSignal,
  ): Promise<DocumentTask> {
    let task = queued;

    try {
      // ── Upload ─────────────────────────────────────────
      this.throwIfCancelled(task, signal);
      task = this.advance(task, LifecycleState.UPLOADING);
      const stored = await this.callCollaborator(StorageError, 'Upload failed', () =>
        this.storage.upload(input.bytes, input.filename, input.contentType),
      );
      task = this.advance(task, LifecycleState.UPLOADED, { storage: stored });

      // ── Submit ─────────────────────────────────────────
      this.throwIfCancelled(task, signal);
      task = this.advance(task, LifecycleState.SUBMITTING);
      const operationHandle = await this.callCollaborator(
        SubmissionError,
        'Submission failed',
        () => this.analysis.submit(stored.url),
      );
      if (!operationHandle) {
        throw new SubmissionError('Analysis service returned no operation handle');
      }
      task = this.advance(task, LifecycleState.SUBMITTED, { operationHandle });

      // ── Poll ───────────────────────────────────────────
      this.throwIfCancelled(task, signal);
      task = this.advance(task, LifecycleState.POLLING);
      const outcome = await this.poller.poll(
        (pollSignal) => this.analysis.fetchStatus(operationHandle, pollSignal),
        this.options.pollPolicy,
        signal,
      );
      const payload = this.unwrapOutcome(task, outcome);

      task = this.advance(task, LifecycleState.COMPLETED, {
        result: { status: 'succeeded', payload },
      });
      this.logger.log(
        `Task ${task.id} completed: ${payload.fields.length} field(s) extracted ` +
          `after ${outcome.attempts} status quer${outcome.attempts === 1 ? 'y' : 'ies'}`,
      );
      return task;
    } catch (error) {
      return this.fail(task, error);
    }
  }

  /** Applies a transition and publishes the snapshot. */
  private advance(
    task: DocumentTask,
    to: LifecycleState,
    payload?: TransitionPayload,
  ): DocumentTask {
    const next = DocumentLifecycle.apply(task, to, payload);
    this.registry.put(next);
    this.logger.debug(`Task ${task.id}: ${task.state} → ${next.state}`);
    return next;
  }

  private fail(task: DocumentTask, error: unknown): DocumentTask {
    const taskError = this.toTaskError(error);

    if (taskError.kind === FailureKind.INVALID_TRANSITION) {
      this.logger.error(`Task ${task.id} hit a lifecycle contract violation: ${taskError.message}`);
    } else {
      this.logger.warn(`Task ${task.id} failed in ${task.state} [${taskError.kind}]: ${taskError.message}`);
    }

    if (DocumentLifecycle.isTerminal(task.state)) {
      return task;
    }

    return this.advance(task, LifecycleState.FAILED, {
      result: { status: 'failed', error: taskError },
    });
  }

  private async callCollaborator<T>(
    ErrorClass: FailureErrorClass,
    context: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof ErrorClass) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ErrorClass(`${context}: ${message}`, { cause: error });
    }
  }

  private unwrapOutcome(
    task: DocumentTask,
    outcome: OperationOutcome<ExtractionPayload>,
  ): ExtractionPayload {
    switch (outcome.kind) {
      case 'succeeded':
        return outcome.payload;
      case 'failed':
        throw new AnalysisFailedError(
          outcome.error.code
            ? `Analysis failed (${outcome.error.code}): ${outcome.error.message}`
            : `Analysis failed: ${outcome.error.message}`,
        );
      case 'timedOut':
        throw new OperationTimedOutError(
          `Analysis still running after ${outcome.attempts} status queries ` +
            `(${outcome.elapsedMs} ms)`,
        );
      case 'pollingError':
        throw new PollingError(
          `Status queries kept failing after ${outcome.attempts} attempt(s): ${outcome.error.message}`,
          { cause: outcome.error },
        );
      case 'cancelled':
        throw new TaskCancelledError(task.id);
    }
  }

  private throwIfCancelled(task: DocumentTask, signal: AbortSignal): void {
    if (signal.aborted) {
      throw new TaskCancelledError(task.id);
    }
  }

  private toTaskError(error: unknown): TaskError {
    if (error instanceof ProcessingError) {
      const cause = error.cause instanceof Error ? error.cause.message : undefined;
      return cause === undefined
        ? { kind: error.kind, message: error.message }
        : { kind: error.kind, message: error.message, cause };
    }

    // Anything else escaped a step unclassified, which is itself a contract breach
    const message = error instanceof Error ? error.message : String(error);
    return { kind: FailureKind.INVALID_TRANSITION, message: `Unexpected error: ${message}` };
  }

  // ── Argument checks ───────────────────────────────────────

  private assertValidInput(input: DocumentInput): void {
    if (!input || !Buffer.isBuffer(input.bytes) || input.bytes.length === 0) {
      throw new InvalidDocumentInputError('Document content must be a non-empty buffer');
    }
    if (!input.filename?.trim()) {
      throw new InvalidDocumentInputError('Filename must not be empty');
    }
    if (!input.contentType?.trim()) {
      throw new InvalidDocumentInputError('Content type must not be empty');
    }
  }

  private assertValidId(id: string): void {
    if (typeof id !== 'string' || id.trim() === '') {
      throw new InvalidDocumentInputError('Document id must not be empty');
    }
  }
}
