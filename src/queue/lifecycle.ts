import { InvalidTransitionError } from './errors.js';
import type { RetryPolicy } from './retry-policy.js';
import type { TaskStore } from './task-store.js';
import type {
  ClaimOutcome,
  FailureDecision,
  TaskRow,
  TaskStatus,
  TerminalTaskStatus,
  TerminalWrite
} from './types.js';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['in_progress', 'failed'],
  // in_progress -> in_progress is a reclaim after a worker crash.
  in_progress: ['in_progress', 'pending', 'completed', 'failed'],
  completed: [],
  failed: []
};

export const EXHAUSTED_ERROR = 'Retry limit exhausted';
const UNKNOWN_ERROR = 'Unknown error';

export function isTerminal(status: TaskStatus): status is TerminalTaskStatus {
  return status === 'completed' || status === 'failed';
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

function normalizeError(error: string): string {
  const trimmed = error.trim();
  return trimmed || UNKNOWN_ERROR;
}

/**
 * Owns every status change of a task. Terminal writes are first-writer-wins:
 * once a task is completed or failed, later writes for the same id are
 * reported as `ignored` and leave the stored outcome untouched.
 */
export class TaskLifecycle {
  constructor(
    private readonly store: TaskStore,
    private readonly retryPolicy: RetryPolicy
  ) {}

  get maxAttempts(): number {
    return this.retryPolicy.maxAttempts;
  }

  claim(id: string): ClaimOutcome {
    if (this.store.transitionToInProgress(id, this.retryPolicy.maxAttempts)) {
      return { kind: 'claimed', task: this.store.require(id) };
    }

    const task = this.store.get(id);
    if (!task) {
      return { kind: 'not_found' };
    }
    if (isTerminal(task.status)) {
      return { kind: 'duplicate', task };
    }

    // Out of attempts without a terminal write, e.g. the worker holding the
    // last attempt died mid-run.
    const applied = this.store.fail(id, task.last_error ?? EXHAUSTED_ERROR);
    const current = this.store.require(id);
    return applied ? { kind: 'exhausted', task: current } : { kind: 'duplicate', task: current };
  }

  complete(id: string, result: number): TerminalWrite {
    if (this.store.complete(id, result)) {
      return 'applied';
    }
    const task = this.store.require(id);
    if (isTerminal(task.status)) {
      return 'ignored';
    }
    throw new InvalidTransitionError(id, task.status, 'completed');
  }

  fail(id: string, error: string): TerminalWrite {
    if (this.store.fail(id, normalizeError(error))) {
      return 'applied';
    }
    const task = this.store.require(id);
    if (isTerminal(task.status)) {
      return 'ignored';
    }
    throw new InvalidTransitionError(id, task.status, 'failed');
  }

  /**
   * Routes a failed attempt: back to `pending` for redelivery while the
   * attempt budget lasts, otherwise a terminal `failed` with this error.
   */
  recordFailure(id: string, error: string): FailureDecision {
    const message = normalizeError(error);
    const task = this.store.require(id);

    if (isTerminal(task.status)) {
      return { kind: 'ignored', task };
    }
    if (!canTransition(task.status, 'pending')) {
      throw new InvalidTransitionError(id, task.status, 'pending');
    }

    if (this.retryPolicy.canRetry(task.attempt_count)) {
      if (this.store.releaseForRetry(id, message)) {
        return {
          kind: 'retry',
          delayMs: this.retryPolicy.delayFor(task.attempt_count),
          task: this.store.require(id)
        };
      }
    } else if (this.store.fail(id, message)) {
      return { kind: 'failed', task: this.store.require(id) };
    }

    // Another writer moved the task between the read and the write.
    const current = this.store.require(id);
    if (isTerminal(current.status)) {
      return { kind: 'ignored', task: current };
    }
    throw new InvalidTransitionError(id, current.status, 'pending');
  }

  reportProgress(id: string, percent: number): boolean {
    if (!Number.isFinite(percent)) {
      return false;
    }
    const clamped = Math.min(100, Math.max(0, percent));
    return this.store.updateProgress(id, clamped);
  }

  get(id: string): TaskRow | null {
    return this.store.get(id);
  }
}
