import { FailureKind, LifecycleState } from '@docsense/processing';

/**
 * SseProgressPayload — the JSON payload sent to the client inside the
 * SSE `data:` field, one per task snapshot.
 */
export interface SseProgressPayload {
  documentId: string;

  /** queued → uploading → uploaded → submitting → submitted → polling → completed | failed */
  state: LifecycleState;

  /** Position in the lifecycle in [0, 100]; 100 for both terminal states */
  percent: number;

  /** Human-readable description of the current step */
  message: string;

  /** Only present when state === 'failed' */
  errorKind?: FailureKind;

  /** Only present when state === 'failed' */
  errorMessage?: string;

  /** ISO 8601 UTC timestamp of the snapshot */
  timestamp: string;
}

/**
 * The parts of an HTTP response an SSE stream writes to.
 * Express's Response satisfies it.
 */
export interface SseResponse {
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  status(code: number): { json(body: unknown): unknown };
  write(chunk: string): unknown;
  end(): unknown;
  on(event: 'close', listener: () => void): unknown;
}
