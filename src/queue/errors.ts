import type { TaskStatus } from './types.js';

export class TaskNotFoundError extends Error {
  constructor(readonly taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = 'TaskNotFoundError';
  }
}

export class TaskAlreadyExistsError extends Error {
  constructor(readonly taskId: string) {
    super(`Task already exists: ${taskId}`);
    this.name = 'TaskAlreadyExistsError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(readonly taskId: string, readonly from: TaskStatus, readonly to: TaskStatus) {
    super(`Invalid transition for task ${taskId}: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * A write against the task store or broker did not go through. The store is
 * the source of truth, so callers log this and leave the message unacked.
 */
export class StoreWriteError extends Error {
  constructor(readonly operation: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown');
    super(`${operation} failed: ${reason}`, options);
    this.name = 'StoreWriteError';
  }
}

export class RequestValidationError extends Error {
  constructor(message: string, readonly statusCode = 422) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
