import { Injectable, Logger } from '@nestjs/common';
import { Subscription } from 'rxjs';
import {
  DocumentTask,
  LIFECYCLE_RANK,
  LifecycleState,
  StatusRegistry,
} from '@docsense/processing';
import { SseProgressPayload, SseResponse } from './interfaces/progress-event.interface';

// ── Timing constants ────────────────────────────────────────

/**
 * SSE keepalive interval (ms).
 * Proxies/LBs (nginx, ALB, Cloudflare) drop idle connections after 60 s.
 */
const HEARTBEAT_INTERVAL_MS = 25_000;

/** Maximum SSE stream lifetime (ms). */
const MAX_STREAM_LIFETIME_MS = 5 * 60 * 1000;

/** Retry directive sent in the first SSE frame (ms), used by EventSource on reconnect. */
const SSE_RETRY_MS = 3_000;

const FINAL_RANK = LIFECYCLE_RANK[LifecycleState.COMPLETED];

/**
 * StreamContext — all mutable state for a single SSE connection, so that
 * cleanup() can tear everything down exactly once.
 */
interface StreamContext {
  readonly documentId: string;
  readonly res: SseResponse;
  eventCounter: number;
  heartbeatTimer: ReturnType<typeof setInterval> | null;
  timeoutTimer: ReturnType<typeof setTimeout> | null;
  subscription: Subscription | null;
  closed: boolean;
}

/**
 * ProgressSseService — bridges StatusRegistry.watch() to Server-Sent Events.
 *
 * Lifecycle of a single SSE stream:
 *
 * 1. **Validate** — 404 JSON if the registry has no task for the id.
 * 2. **Open** — SSE headers, then a `retry:` directive.
 * 3. **Subscribe** — watch(id) emits the current snapshot first, then every
 *    update; each becomes a `progress` frame. The stream ends after the
 *    terminal snapshot.
 * 4. **Heartbeat** — a `: heartbeat` comment every 25 s.
 * 5. **Timeout** — force-closed after 5 minutes.
 * 6. **Cleanup** — on terminal snapshot, client disconnect, or timeout.
 */
@Injectable()
export class ProgressSseService {
  private readonly logger = new Logger(ProgressSseService.name);

  constructor(private readonly registry: StatusRegistry) {}

  // ── Public API ──────────────────────────────────────────

  /**
   * Opens an SSE stream for the given document.
   *
   * @returns `true` if the stream was opened, `false` if a 404 was sent.
   *          The caller should not touch `res` after this method returns.
   */
  streamProgress(documentId: string, res: SseResponse): boolean {
    const task = this.registry.get(documentId);

    if (!task) {
      this.logger.warn(`SSE rejected: document ${documentId} not found`);
      res.status(404).json({
        statusCode: 404,
        error: 'Not Found',
        message: `Document ${documentId} not found`,
      });
      return false;
    }

    this.logger.log(`SSE stream opened for document ${documentId} (state: ${task.state})`);

    const ctx: StreamContext = {
      documentId,
      res,
      eventCounter: 0,
      heartbeatTimer: null,
      timeoutTimer: null,
      subscription: null,
      closed: false,
    };

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    // Prevent nginx from buffering SSE chunks
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();
    res.write(`retry: ${SSE_RETRY_MS}\n\n`);

    res.on('close', () => {
      if (!ctx.closed) {
        this.logger.log(`Client disconnected from SSE stream for document ${documentId}`);
      }
      this.cleanup(ctx);
    });

    ctx.heartbeatTimer = setInterval(() => {
      this.writeHeartbeat(ctx);
    }, HEARTBEAT_INTERVAL_MS);

    ctx.timeoutTimer = setTimeout(() => {
      this.logger.warn(`SSE stream for document ${documentId} reached max lifetime. Force-closing.`);
      this.writeSseFrame(ctx, 'timeout', {
        documentId,
        message: 'Stream timed out — reconnect or query GET /documents/:id',
      });
      this.cleanup(ctx);
    }, MAX_STREAM_LIFETIME_MS);

    ctx.subscription = this.registry.watch(documentId).subscribe({
      next: (snapshot: DocumentTask) => {
        this.writeSseFrame(ctx, 'progress', this.toPayload(snapshot));
      },
      error: (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Status watch failed for document ${documentId}: ${message}`);
        this.writeSseFrame(ctx, 'error', { documentId, message: 'Stream error — please retry' });
        this.cleanup(ctx);
      },
      complete: () => {
        this.logger.log(`Document ${documentId} reached a terminal state. Closing SSE.`);
        this.cleanup(ctx);
      },
    });

    return true;
  }

  // ── Private helpers ──────────────────────────────────────

  /**
   * Wire format:
   *   id: <counter>\n
   *   event: <eventName>\n
   *   data: <json>\n
   *   \n
   */
  private writeSseFrame(ctx: StreamContext, eventName: string, payload: object): void {
    if (ctx.closed) return;

    try {
      const id = ++ctx.eventCounter;
      ctx.res.write(`id: ${id}\nevent: ${eventName}\ndata: ${JSON.stringify(payload)}\n\n`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to write SSE frame for document ${ctx.documentId}: ${message}`);
    }
  }

  private writeHeartbeat(ctx: StreamContext): void {
    if (ctx.closed) return;

    try {
      ctx.res.write(`: heartbeat\n\n`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to write heartbeat for document ${ctx.documentId}: ${message}`);
    }
  }

  /** Safe to call multiple times; the `closed` flag prevents double-release. */
  private cleanup(ctx: StreamContext): void {
    if (ctx.closed) return;
    ctx.closed = true;

    if (ctx.heartbeatTimer) {
      clearInterval(ctx.heartbeatTimer);
      ctx.heartbeatTimer = null;
    }
    if (ctx.timeoutTimer) {
      clearTimeout(ctx.timeoutTimer);
      ctx.timeoutTimer = null;
    }
    if (ctx.subscription) {
      ctx.subscription.unsubscribe();
      ctx.subscription = null;
    }

    try {
      ctx.res.end();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.debug(`Response for document ${ctx.documentId} already closed: ${message}`);
    }
  }

  private toPayload(task: DocumentTask): SseProgressPayload {
    const payload: SseProgressPayload = {
      documentId: task.id,
      state: task.state,
      percent: Math.round((LIFECYCLE_RANK[task.state] / FINAL_RANK) * 100),
      message: this.stateToMessage(task),
      timestamp: task.updatedAt.toISOString(),
    };

    if (task.result?.status === 'failed') {
      payload.errorKind = task.result.error.kind;
      payload.errorMessage = task.result.error.message;
    }
    return payload;
  }

  private stateToMessage(task: DocumentTask): string {
    switch (task.state) {
      case LifecycleState.QUEUED:
        return 'Document is queued for processing';
      case LifecycleState.UPLOADING:
        return 'Uploading document to storage';
      case LifecycleState.UPLOADED:
        return 'Document stored';
      case LifecycleState.SUBMITTING:
        return 'Submitting document for analysis';
      case LifecycleState.SUBMITTED:
        return 'Analysis started';
      case LifecycleState.POLLING:
        return 'Waiting for analysis results';
      case LifecycleState.COMPLETED:
        return 'Extraction completed';
      case LifecycleState.FAILED:
        return 'Processing failed';
    }
  }
}
