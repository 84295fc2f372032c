import { openBrokerDb, openTaskDb, type SqliteDb } from './db.js';
import { TaskLifecycle } from './lifecycle.js';
import { RetryPolicy } from './retry-policy.js';
import { TaskStore } from './task-store.js';
import type { Clock } from './types.js';
import { WorkQueue } from './work-queue.js';
import type { RetryConfig } from './config.js';

export type ManualClock = {
  now: Clock;
  advance: (ms: number) => void;
};

export function createManualClock(start = '2024-01-01T00:00:00.000Z'): ManualClock {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance: (ms) => {
      current += ms;
    }
  };
}

export type MemoryStores = {
  taskDb: SqliteDb;
  brokerDb: SqliteDb;
  store: TaskStore;
  queue: WorkQueue;
  lifecycle: TaskLifecycle;
  close: () => void;
};

export const TEST_RETRY: RetryConfig = {
  maxAttempts: 3,
  backoff: 'fixed',
  delayMs: 0,
  maxDelayMs: 0
};

/** Fresh in-memory task store and broker sharing one clock. */
export function openMemoryStores(clock: Clock, retry: Partial<RetryConfig> = {}): MemoryStores {
  const taskDb = openTaskDb(':memory:');
  const brokerDb = openBrokerDb(':memory:');
  const store = new TaskStore(taskDb, clock);
  const queue = new WorkQueue(brokerDb, clock);
  const lifecycle = new TaskLifecycle(store, new RetryPolicy({ ...TEST_RETRY, ...retry }));
  return {
    taskDb,
    brokerDb,
    store,
    queue,
    lifecycle,
    close: () => {
      taskDb.close();
      brokerDb.close();
    }
  };
}
