import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createLogger, silentLogger } from '../lib/logger.js';
import { sleep } from '../lib/sleep.js';
import { submitTask } from '../queue/api.js';
import { createManualClock, openMemoryStores, type ManualClock, type MemoryStores } from '../queue/testing.js';
import type { Workload } from './execute.js';
import { createHeavyComputation } from './heavy-computation.js';
import { QueueWorker, type QueueWorkerOptions } from './queue-worker.js';

const options: QueueWorkerOptions = {
  workerId: 'worker-test-1',
  pollMs: 10,
  visibilityTimeoutMs: 60_000,
  executionTimeoutMs: 0
};

function workerFor(stores: MemoryStores, workload: Workload, overrides: Partial<QueueWorkerOptions> = {}): QueueWorker {
  return new QueueWorker(
    { queue: stores.queue, lifecycle: stores.lifecycle, workload, logger: silentLogger },
    { ...options, ...overrides }
  );
}

function submit(stores: MemoryStores, taskId: string, data: Record<string, unknown> | null = null): void {
  stores.store.create(taskId);
  stores.queue.enqueue(taskId, data);
}

describe('QueueWorker.runOnce', () => {
  let clock: ManualClock;
  let stores: MemoryStores;

  beforeEach(() => {
    clock = createManualClock();
    stores = openMemoryStores(clock.now);
  });

  afterEach(() => {
    stores.close();
  });

  it('is idle when nothing is queued', async () => {
    const worker = workerFor(stores, async () => 1);
    assert.deepEqual(await worker.runOnce(), { kind: 'idle' });
  });

  it('completes a task and acknowledges its message', async () => {
    submit(stores, 'task-1', { x: 1 });
    const worker = workerFor(stores, async () => 42);

    assert.deepEqual(await worker.runOnce(), { kind: 'completed', taskId: 'task-1', result: 42 });

    const task = stores.store.get('task-1');
    assert.equal(task?.status, 'completed');
    assert.equal(task?.result, 42);
    assert.equal(task?.attempt_count, 1);
    assert.equal(task?.progress, 100);
    assert.deepEqual(stores.queue.stats(), { ready: 0, delayed: 0, leased: 0 });
  });

  it('hands the message payload to the workload', async () => {
    submit(stores, 'task-1', { input: 123, multiply_by: 2 });
    const seen: unknown[] = [];
    const worker = workerFor(stores, async (payload) => {
      seen.push(payload);
      return 0;
    });

    await worker.runOnce();

    assert.deepEqual(seen, [{ input: 123, multiply_by: 2 }]);
  });

  it('records progress while the task runs', async () => {
    submit(stores, 'task-1');
    const observed: Array<number | null> = [];
    const worker = workerFor(stores, async (_payload, context) => {
      context.reportProgress(40);
      observed.push(stores.store.get(context.taskId)?.progress ?? null);
      return 1;
    });

    await worker.runOnce();

    assert.deepEqual(observed, [40]);
  });

  it('retries a transient failure and completes on the next attempt', async () => {
    submit(stores, 'task-1');
    let calls = 0;
    const worker = workerFor(stores, async () => {
      calls += 1;
      if (calls === 1) {
        throw new Error('connection reset');
      }
      return 7;
    });

    assert.deepEqual(await worker.runOnce(), {
      kind: 'retry_scheduled',
      taskId: 'task-1',
      delayMs: 0,
      error: 'connection reset'
    });
    assert.equal(stores.store.get('task-1')?.status, 'pending');
    assert.equal(stores.store.get('task-1')?.last_error, 'connection reset');

    assert.deepEqual(await worker.runOnce(), { kind: 'completed', taskId: 'task-1', result: 7 });
    const task = stores.store.get('task-1');
    assert.equal(task?.attempt_count, 2);
    assert.equal(task?.error_message, null);
  });

  it('fails the task after the last attempt and drops the message', async () => {
    submit(stores, 'task-1');
    const worker = workerFor(stores, async () => {
      throw new Error('boom');
    });

    assert.equal((await worker.runOnce()).kind, 'retry_scheduled');
    assert.equal((await worker.runOnce()).kind, 'retry_scheduled');
    assert.deepEqual(await worker.runOnce(), { kind: 'failed', taskId: 'task-1', error: 'boom' });

    const task = stores.store.get('task-1');
    assert.equal(task?.status, 'failed');
    assert.equal(task?.attempt_count, 3);
    assert.equal(task?.error_message, 'boom');
    assert.equal(task?.result, null);
    assert.equal(task?.completed_at, '2024-01-01T00:00:00.000Z');
    assert.deepEqual(stores.queue.stats(), { ready: 0, delayed: 0, leased: 0 });
    assert.deepEqual(await worker.runOnce(), { kind: 'idle' });
  });

  it('holds a retry back for the backoff delay', async () => {
    const delayed = openMemoryStores(clock.now, { delayMs: 5000 });
    try {
      submit(delayed, 'task-1');
      const worker = workerFor(delayed, async () => {
        throw new Error('flaky');
      });

      assert.equal((await worker.runOnce()).kind, 'retry_scheduled');
      assert.deepEqual(delayed.queue.stats(), { ready: 0, delayed: 1, leased: 0 });
      assert.deepEqual(await worker.runOnce(), { kind: 'idle' });

      clock.advance(5000);
      assert.equal((await worker.runOnce()).kind, 'retry_scheduled');
      assert.equal(delayed.store.get('task-1')?.attempt_count, 2);
    } finally {
      delayed.close();
    }
  });

  it('treats a timed out attempt as a failure', async () => {
    submit(stores, 'task-1');
    const worker = workerFor(stores, () => new Promise<number>(() => undefined), { executionTimeoutMs: 20 });

    assert.deepEqual(await worker.runOnce(), {
      kind: 'retry_scheduled',
      taskId: 'task-1',
      delayMs: 0,
      error: 'Execution timed out after 20ms'
    });
  });

  it('drops a redelivered message for a finished task', async () => {
    submit(stores, 'task-1');
    stores.lifecycle.claim('task-1');
    stores.lifecycle.complete('task-1', 3);
    let calls = 0;
    const worker = workerFor(stores, async () => {
      calls += 1;
      return 9;
    });

    assert.deepEqual(await worker.runOnce(), { kind: 'skipped', taskId: 'task-1', reason: 'duplicate' });
    assert.equal(calls, 0);
    assert.equal(stores.store.get('task-1')?.result, 3);
    assert.deepEqual(stores.queue.stats(), { ready: 0, delayed: 0, leased: 0 });
  });

  it('drops a message for a task the store does not know', async () => {
    stores.queue.enqueue('ghost', null);
    const worker = workerFor(stores, async () => 1);

    assert.deepEqual(await worker.runOnce(), { kind: 'skipped', taskId: 'ghost', reason: 'not_found' });
    assert.deepEqual(stores.queue.stats(), { ready: 0, delayed: 0, leased: 0 });
  });

  it('leaves the message leased when the task store is unavailable', async () => {
    submit(stores, 'task-1');
    stores.taskDb.close();
    const worker = workerFor(stores, async () => 1);

    const result = await worker.runOnce();

    assert.equal(result.kind, 'error');
    assert.equal(result.kind === 'error' ? result.taskId : null, 'task-1');
    assert.deepEqual(stores.queue.stats(), { ready: 0, delayed: 0, leased: 1 });

    clock.advance(60_000);
    assert.deepEqual(stores.queue.stats(), { ready: 1, delayed: 0, leased: 0 });
  });

  it('runs a submitted task to its computed result', async () => {
    const { task_id: taskId } = submitTask(
      { store: stores.store, queue: stores.queue, logger: silentLogger, generateId: () => 'task-e2e' },
      { x: 1 }
    );
    const worker = workerFor(stores, createHeavyComputation({ minDurationMs: 0, maxDurationMs: 0, stepMs: 1000, failureRate: 0 }));

    assert.equal(stores.store.get(taskId)?.status, 'pending');
    await worker.runOnce();

    const task = stores.store.get(taskId);
    assert.equal(task?.status, 'completed');
    assert.equal(task?.result, 499_999_500_181);
    assert.equal(task?.error_message, null);
    assert.equal(task?.completed_at, '2024-01-01T00:00:00.000Z');
  });
});

describe('QueueWorker loop', () => {
  it('drains the queue until stopped', async () => {
    const stores = openMemoryStores(createManualClock().now);
    submit(stores, 'task-1');
    submit(stores, 'task-2');
    const worker = workerFor(stores, async () => 5);

    try {
      worker.start();
      for (let i = 0; i < 100 && stores.store.countByStatus().completed < 2; i += 1) {
        await new Promise((resolve) => setTimeout(resolve, 10));
      }
      await worker.stop();

      assert.deepEqual(stores.store.countByStatus(), { pending: 0, in_progress: 0, completed: 2, failed: 0 });
    } finally {
      stores.close();
    }
  });
});

describe('QueueWorker lease renewal', () => {
  it('keeps a task that outlives its lease away from other workers', async () => {
    const stores = openMemoryStores(() => new Date());
    const lines: string[] = [];
    const logger = createLogger('queue-worker', { log: (line) => lines.push(line), error: (line) => lines.push(line) });
    let runs = 0;
    const workload: Workload = async () => {
      runs += 1;
      await sleep(900);
      return 1;
    };
    const deps = { queue: stores.queue, lifecycle: stores.lifecycle, workload, logger };
    const workers = ['lease-1', 'lease-2'].map((workerId) => new QueueWorker(deps, {
      workerId,
      pollMs: 20,
      visibilityTimeoutMs: 300,
      executionTimeoutMs: 0
    }));
    submit(stores, 'task-1');

    try {
      for (const worker of workers) {
        worker.start();
      }
      for (let i = 0; i < 150 && stores.store.get('task-1')?.status !== 'completed'; i += 1) {
        await sleep(20);
      }
      await Promise.all(workers.map((worker) => worker.stop()));

      assert.equal(runs, 1);
      assert.equal(stores.store.get('task-1')?.status, 'completed');
      assert.equal(stores.store.get('task-1')?.attempt_count, 1);
      assert.deepEqual(lines.filter((line) => line.includes('lease lost')), []);
    } finally {
      stores.close();
    }
  });

  it('warns when the lease can no longer be renewed', async () => {
    const stores = openMemoryStores(() => new Date());
    const lines: string[] = [];
    const logger = createLogger('queue-worker', { log: (line) => lines.push(line), error: (line) => lines.push(line) });
    submit(stores, 'task-1');
    const worker = new QueueWorker(
      {
        queue: stores.queue,
        lifecycle: stores.lifecycle,
        workload: async () => {
          stores.brokerDb.prepare('UPDATE queue_messages SET lease_owner = ?').run('someone-else');
          await sleep(250);
          return 1;
        },
        logger
      },
      { workerId: 'lease-1', pollMs: 20, visibilityTimeoutMs: 300, executionTimeoutMs: 0 }
    );

    try {
      await worker.runOnce();

      assert.ok(lines.includes('[queue-worker] WARN lease lost during execution, message may be redelivered task_id=task-1 message_id=1'));
    } finally {
      stores.close();
    }
  });
});

