import { LifecycleState } from '../enums/lifecycle-state.enum';
import { InvalidTransitionError } from '../errors/processing.errors';
import {
  DocumentTask,
  TaskResult,
} from '../interfaces/document-task.interface';
import { StoredObject } from '../interfaces/collaborators.interface';

/** Success-path edges. FAILED is reachable from every non-terminal state. */
const SUCCESS_EDGES: Readonly<Partial<Record<LifecycleState, LifecycleState>>> = {
  [LifecycleState.QUEUED]: LifecycleState.UPLOADING,
  [LifecycleState.UPLOADING]: LifecycleState.UPLOADED,
  [LifecycleState.UPLOADED]: LifecycleState.SUBMITTING,
  [LifecycleState.SUBMITTING]: LifecycleState.SUBMITTED,
  [LifecycleState.SUBMITTED]: LifecycleState.POLLING,
  [LifecycleState.POLLING]: LifecycleState.COMPLETED,
};

/** Data a transition carries into the new snapshot. */
export interface TransitionPayload {
  storage?: StoredObject;
  operationHandle?: string;
  result?: TaskResult;
}

export interface NewTaskFields {
  sourceFilename: string;
  contentType: string;
  sizeBytes: number;
}

function isTerminal(state: LifecycleState): boolean {
  return state === LifecycleState.COMPLETED || state === LifecycleState.FAILED;
}

function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  if (isTerminal(from)) return false;
  if (to === LifecycleState.FAILED) return true;
  return SUCCESS_EDGES[from] === to;
}

function createTask(
  id: string,
  fields: NewTaskFields,
  now: Date = new Date(),
): DocumentTask {
  return Object.freeze({
    id,
    state: LifecycleState.QUEUED,
    sourceFilename: fields.sourceFilename,
    contentType: fields.contentType,
    sizeBytes: fields.sizeBytes,
    createdAt: now,
    updatedAt: now,
  });
}

/**
 * Returns a new frozen snapshot of `task` in state `to`.
 *
 * Throws InvalidTransitionError for an edge canTransition() rejects, or when
 * the payload the target state requires is missing.
 */
function apply(
  task: DocumentTask,
  to: LifecycleState,
  payload: TransitionPayload = {},
  now: Date = new Date(),
): DocumentTask {
  if (!canTransition(task.state, to)) {
    throw new InvalidTransitionError(task.state, to);
  }

  // updatedAt never moves backwards, even if the wall clock does
  const updatedAt =
    now.getTime() < task.updatedAt.getTime() ? task.updatedAt : now;

  switch (to) {
    case LifecycleState.UPLOADED: {
      if (!payload.storage) {
        throw new InvalidTransitionError(task.state, to, 'storage object missing');
      }
      return Object.freeze({
        ...task,
        state: to,
        storageLocation: payload.storage.url,
        storageKey: payload.storage.key,
        updatedAt,
      });
    }

    case LifecycleState.SUBMITTED: {
      if (!payload.operationHandle) {
        throw new InvalidTransitionError(task.state, to, 'operation handle missing');
      }
      return Object.freeze({
        ...task,
        state: to,
        operationHandle: payload.operationHandle,
        updatedAt,
      });
    }

    case LifecycleState.COMPLETED:
    case LifecycleState.FAILED: {
      const expected = to === LifecycleState.COMPLETED ? 'succeeded' : 'failed';
      if (payload.result?.status !== expected) {
        throw new InvalidTransitionError(
          task.state,
          to,
          `expected a ${expected} result`,
        );
      }
      return Object.freeze({ ...task, state: to, result: payload.result, updatedAt });
    }

    default:
      return Object.freeze({ ...task, state: to, updatedAt });
  }
}

/**
 * DocumentLifecycle — legal states and transitions of a DocumentTask.
 *
 * Pure: no I/O and no timers. The orchestrator is the only caller that
 * advances tasks; everything else only reads snapshots.
 */
export const DocumentLifecycle = {
  canTransition,
  apply,
  isTerminal,
  createTask,
} as const;
