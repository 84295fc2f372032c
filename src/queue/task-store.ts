import { guardWrite, type SqliteDb } from './db.js';
import { TaskAlreadyExistsError, TaskNotFoundError } from './errors.js';
import type { Clock, TaskRow, TaskStatus } from './types.js';

const systemClock: Clock = () => new Date();

/**
 * Durable task records. Every mutation is one conditional UPDATE on one row,
 * so concurrent writers (gateway, several workers) never interleave partial
 * state. Mutators return whether the row changed; callers decide what an
 * unchanged row means.
 */
export class TaskStore {
  constructor(
    private readonly db: SqliteDb,
    private readonly clock: Clock = systemClock
  ) {}

  private nowIso(): string {
    return this.clock().toISOString();
  }

  create(id: string): TaskRow {
    const now = this.nowIso();
    const inserted = guardWrite('create task', () => this.db
      .prepare<[string, string, string]>(
        `INSERT OR IGNORE INTO tasks (id, status, attempt_count, created_at, updated_at)
         VALUES (?, 'pending', 0, ?, ?)`
      )
      .run(id, now, now));

    if (inserted.changes !== 1) {
      throw new TaskAlreadyExistsError(id);
    }
    return this.require(id);
  }

  get(id: string): TaskRow | null {
    const row = this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id);
    return row ?? null;
  }

  require(id: string): TaskRow {
    const row = this.get(id);
    if (!row) {
      throw new TaskNotFoundError(id);
    }
    return row;
  }

  /**
   * Claims the task for an attempt. A task left `in_progress` by a crashed
   * worker may be claimed again; the attempt ceiling still applies.
   */
  transitionToInProgress(id: string, maxAttempts: number): boolean {
    const now = this.nowIso();
    const claimed = guardWrite('claim task', () => this.db
      .prepare<[string, string, number]>(
        `UPDATE tasks SET
           status = 'in_progress',
           attempt_count = attempt_count + 1,
           progress = NULL,
           updated_at = ?
         WHERE id = ?
           AND status IN ('pending', 'in_progress')
           AND attempt_count < ?`
      )
      .run(now, id, maxAttempts));
    return claimed.changes === 1;
  }

  releaseForRetry(id: string, error: string): boolean {
    const now = this.nowIso();
    const released = guardWrite('release task for retry', () => this.db
      .prepare<[string, string, string]>(
        `UPDATE tasks SET
           status = 'pending',
           last_error = ?,
           progress = NULL,
           updated_at = ?
         WHERE id = ? AND status = 'in_progress'`
      )
      .run(error, now, id));
    return released.changes === 1;
  }

  complete(id: string, result: number): boolean {
    const now = this.nowIso();
    const completed = guardWrite('complete task', () => this.db
      .prepare<[number, string, string, string]>(
        `UPDATE tasks SET
           status = 'completed',
           result = ?,
           error_message = NULL,
           progress = 100,
           completed_at = ?,
           updated_at = ?
         WHERE id = ? AND status = 'in_progress'`
      )
      .run(result, now, now, id));
    return completed.changes === 1;
  }

  fail(id: string, error: string): boolean {
    const now = this.nowIso();
    const failed = guardWrite('fail task', () => this.db
      .prepare<[string, string, string, string, string]>(
        `UPDATE tasks SET
           status = 'failed',
           result = NULL,
           error_message = ?,
           last_error = ?,
           completed_at = ?,
           updated_at = ?
         WHERE id = ? AND status IN ('pending', 'in_progress')`
      )
      .run(error, error, now, now, id));
    return failed.changes === 1;
  }

  updateProgress(id: string, percent: number): boolean {
    const now = this.nowIso();
    const updated = guardWrite('update task progress', () => this.db
      .prepare<[number, string, string]>(
        `UPDATE tasks SET progress = ?, updated_at = ?
         WHERE id = ? AND status = 'in_progress'`
      )
      .run(percent, now, id));
    return updated.changes === 1;
  }

  countByStatus(): Record<TaskStatus, number> {
    const rows = this.db
      .prepare<[], { status: TaskStatus; count: number }>('SELECT status, COUNT(*) AS count FROM tasks GROUP BY status')
      .all();
    const counts: Record<TaskStatus, number> = { pending: 0, in_progress: 0, completed: 0, failed: 0 };
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }
}
