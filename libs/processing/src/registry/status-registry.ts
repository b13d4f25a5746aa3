import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import {
  Observable,
  Subject,
  concat,
  defer,
  filter,
  of,
  takeWhile,
  EMPTY,
} from 'rxjs';
import { LIFECYCLE_RANK } from '../enums/lifecycle-state.enum';
import { DocumentLifecycle } from '../lifecycle/document-lifecycle';
import { DocumentTask } from '../interfaces/document-task.interface';
import { ProcessingOptions } from '../interfaces/processing-options.interface';
import { PROCESSING_OPTIONS } from '../processing.constants';

const MIN_SWEEP_INTERVAL_MS = 1_000;

/**
 * StatusRegistry — in-memory map of document id → latest DocumentTask snapshot.
 *
 * The only structure shared between concurrently running pipelines. Snapshots
 * are frozen, so readers get a stable value without locking; writes replace
 * the map entry in one synchronous step.
 *
 * Ordering: last write wins by `updatedAt`. A write older than the stored
 * snapshot, or equally old but earlier in the lifecycle, is dropped, and so
 * is any write over a terminal snapshot.
 *
 * Retention: entries live for the process lifetime. Nothing survives a
 * restart. When `retentionMs` is positive, terminal snapshots older than
 * that are swept periodically; in-flight tasks are never swept.
 */
@Injectable()
export class StatusRegistry implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(StatusRegistry.name);
  private readonly tasks = new Map<string, DocumentTask>();
  private readonly changes = new Subject<DocumentTask>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private readonly retentionMs: number;
  private readonly sweepIntervalMs: number;

  constructor(
    @Optional()
    @Inject(PROCESSING_OPTIONS)
    options?: Pick<ProcessingOptions, 'retentionMs' | 'sweepIntervalMs'>,
  ) {
    this.retentionMs = options?.retentionMs ?? 0;
    this.sweepIntervalMs = Math.max(
      options?.sweepIntervalMs ?? this.retentionMs / 2,
      MIN_SWEEP_INTERVAL_MS,
    );
  }

  onModuleInit(): void {
    if (this.retentionMs <= 0) {
      this.logger.log('Status retention: unbounded (process lifetime)');
      return;
    }

    this.sweepTimer = setInterval(() => {
      const evicted = this.evictTerminatedBefore(
        new Date(Date.now() - this.retentionMs),
      );
      if (evicted > 0) {
        this.logger.debug(`Evicted ${evicted} expired task(s)`);
      }
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();

    this.logger.log(`Status retention: ${this.retentionMs} ms after completion`);
  }

  onModuleDestroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.changes.complete();
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Upserts a snapshot. Returns false when the write was stale and dropped.
   */
  put(task: DocumentTask): boolean {
    const existing = this.tasks.get(task.id);

    if (existing && this.isStale(task, existing)) {
      this.logger.warn(
        `Dropped stale snapshot for task ${task.id}: ` +
          `${task.state}@${task.updatedAt.toISOString()} is behind ` +
          `${existing.state}@${existing.updatedAt.toISOString()}`,
      );
      return false;
    }

    this.tasks.set(task.id, task);
    this.changes.next(task);
    return true;
  }

  get(id: string): DocumentTask | null {
    return this.tasks.get(id) ?? null;
  }

  delete(id: string): boolean {
    return this.tasks.delete(id);
  }

  /**
   * Emits the current snapshot, then every accepted update for `id`,
   * completing after the terminal snapshot. Completes empty for an unknown id.
   */
  watch(id: string): Observable<DocumentTask> {
    return defer(() => {
      const current = this.tasks.get(id);
      if (!current) return EMPTY;

      return concat(
        of(current),
        this.changes.pipe(filter((task) => task.id === id)),
      ).pipe(takeWhile((task) => !DocumentLifecycle.isTerminal(task.state), true));
    });
  }

  /** Removes terminal snapshots last updated before `cutoff`. */
  evictTerminatedBefore(cutoff: Date): number {
    let evicted = 0;
    for (const [id, task] of this.tasks) {
      if (
        DocumentLifecycle.isTerminal(task.state) &&
        task.updatedAt.getTime() < cutoff.getTime()
      ) {
        this.tasks.delete(id);
        evicted++;
      }
    }
    return evicted;
  }

  private isStale(incoming: DocumentTask, existing: DocumentTask): boolean {
    // terminal snapshots are write-once
    if (DocumentLifecycle.isTerminal(existing.state)) return true;

    const delta = incoming.updatedAt.getTime() - existing.updatedAt.getTime();
    if (delta !== 0) return delta < 0;
    return LIFECYCLE_RANK[incoming.state] < LIFECYCLE_RANK[existing.state];
  }
}
