import { guardWrite, type SqliteDb } from './db.js';
import type {
  Clock,
  EnqueueOptions,
  QueueMessage,
  QueueMessageRow,
  QueueStats,
  TaskPayload
} from './types.js';

const systemClock: Clock = () => new Date();

function isPayload(value: unknown): value is TaskPayload {
  return value === null || (typeof value === 'object' && !Array.isArray(value));
}

function parsePayload(raw: string): TaskPayload {
  const parsed: unknown = JSON.parse(raw);
  return isPayload(parsed) ? parsed : null;
}

function toMessage(row: QueueMessageRow): QueueMessage {
  return {
    id: row.id,
    taskId: row.task_id,
    payload: parsePayload(row.payload_json),
    deliveries: row.deliveries,
    leaseOwner: row.lease_owner,
    leaseExpiresAt: row.lease_expires_at
  };
}

/**
 * SQLite-backed broker with at-least-once delivery. `dequeue` leases a message
 * instead of removing it; a message whose lease runs out without an `ack` or
 * `requeue` becomes deliverable again.
 */
export class WorkQueue {
  constructor(
    private readonly db: SqliteDb,
    private readonly clock: Clock = systemClock
  ) {}

  private offsetIso(ms: number): string {
    return new Date(this.clock().getTime() + ms).toISOString();
  }

  enqueue(taskId: string, payload: TaskPayload, options: EnqueueOptions = {}): QueueMessage {
    const now = this.offsetIso(0);
    const availableAt = this.offsetIso(Math.max(0, options.delayMs ?? 0));

    const row = guardWrite('enqueue message', () => {
      const inserted = this.db
        .prepare<[string, string, string, string, string]>(
          `INSERT INTO queue_messages (task_id, payload_json, deliveries, available_at, created_at, updated_at)
           VALUES (?, ?, 0, ?, ?, ?)`
        )
        .run(taskId, JSON.stringify(payload), availableAt, now, now);
      return this.db
        .prepare<[number | bigint], QueueMessageRow>('SELECT * FROM queue_messages WHERE id = ?')
        .get(inserted.lastInsertRowid);
    });

    if (!row) {
      throw new Error(`Enqueued message for task ${taskId} could not be read back`);
    }
    return toMessage(row);
  }

  dequeue(consumerId: string, visibilityTimeoutMs: number): QueueMessage | null {
    const tx = this.db.transaction((): QueueMessage | null => {
      const now = this.offsetIso(0);
      const candidate = this.db
        .prepare<[string, string], { id: number }>(
          `SELECT id
           FROM queue_messages
           WHERE (lease_expires_at IS NULL AND available_at <= ?)
              OR (lease_expires_at IS NOT NULL AND lease_expires_at <= ?)
           ORDER BY available_at ASC, id ASC
           LIMIT 1`
        )
        .get(now, now);

      if (!candidate) {
        return null;
      }

      const leaseExpiresAt = this.offsetIso(visibilityTimeoutMs);
      const leased = this.db
        .prepare<[string, string, string, number]>(
          `UPDATE queue_messages SET
             lease_owner = ?,
             lease_expires_at = ?,
             deliveries = deliveries + 1,
             updated_at = ?
           WHERE id = ?`
        )
        .run(consumerId, leaseExpiresAt, now, candidate.id);

      if (leased.changes !== 1) {
        return null;
      }

      const row = this.db
        .prepare<[number], QueueMessageRow>('SELECT * FROM queue_messages WHERE id = ?')
        .get(candidate.id);
      return row ? toMessage(row) : null;
    });

    return guardWrite('dequeue message', () => tx.immediate());
  }

  ack(messageId: number, consumerId: string): boolean {
    const deleted = guardWrite('ack message', () => this.db
      .prepare<[number, string]>('DELETE FROM queue_messages WHERE id = ? AND lease_owner = ?')
      .run(messageId, consumerId));
    return deleted.changes === 1;
  }

  requeue(messageId: number, consumerId: string, delayMs: number): boolean {
    const now = this.offsetIso(0);
    const availableAt = this.offsetIso(Math.max(0, delayMs));
    const released = guardWrite('requeue message', () => this.db
      .prepare<[string, string, number, string]>(
        `UPDATE queue_messages SET
           lease_owner = NULL,
           lease_expires_at = NULL,
           available_at = ?,
           updated_at = ?
         WHERE id = ? AND lease_owner = ?`
      )
      .run(availableAt, now, messageId, consumerId));
    return released.changes === 1;
  }

  extendLease(messageId: number, consumerId: string, visibilityTimeoutMs: number): boolean {
    const now = this.offsetIso(0);
    const leaseExpiresAt = this.offsetIso(visibilityTimeoutMs);
    const extended = guardWrite('extend message lease', () => this.db
      .prepare<[string, string, number, string]>(
        `UPDATE queue_messages
         SET lease_expires_at = ?, updated_at = ?
         WHERE id = ? AND lease_owner = ?`
      )
      .run(leaseExpiresAt, now, messageId, consumerId));
    return extended.changes === 1;
  }

  stats(): QueueStats {
    const now = this.offsetIso(0);
    const row = this.db
      .prepare<[string, string, string, string], { ready: number | null; delayed: number | null; leased: number | null }>(
        `SELECT
           SUM(CASE WHEN (lease_expires_at IS NULL AND available_at <= ?)
                      OR (lease_expires_at IS NOT NULL AND lease_expires_at <= ?) THEN 1 ELSE 0 END) AS ready,
           SUM(CASE WHEN lease_expires_at IS NULL AND available_at > ? THEN 1 ELSE 0 END) AS delayed,
           SUM(CASE WHEN lease_expires_at IS NOT NULL AND lease_expires_at > ? THEN 1 ELSE 0 END) AS leased
         FROM queue_messages`
      )
      .get(now, now, now, now);

    return {
      ready: row?.ready ?? 0,
      delayed: row?.delayed ?? 0,
      leased: row?.leased ?? 0
    };
  }
}
