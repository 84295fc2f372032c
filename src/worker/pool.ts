import { randomUUID } from 'node:crypto';
import { createLogger, type Logger } from '../lib/logger.js';
import { openBrokerDb, openTaskDb } from '../queue/db.js';
import { TaskLifecycle } from '../queue/lifecycle.js';
import { RetryPolicy } from '../queue/retry-policy.js';
import { TaskStore } from '../queue/task-store.js';
import { WorkQueue } from '../queue/work-queue.js';
import type { WorkerConfig } from './config.js';
import { createIsolatedWorkload, workerModuleUrl } from './isolated-workload.js';
import { QueueWorker, type QueueWorkerDeps, type QueueWorkerOptions } from './queue-worker.js';

export type WorkerPoolOptions = Omit<QueueWorkerOptions, 'workerId'> & {
  concurrency: number;
  workerIdPrefix?: string;
};

export class WorkerPool {
  readonly workers: readonly QueueWorker[];

  constructor(deps: QueueWorkerDeps, options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error('concurrency must be a positive integer');
    }
    const prefix = options.workerIdPrefix ?? `worker-${randomUUID()}`;
    this.workers = Array.from({ length: options.concurrency }, (_, index) => {
      const workerId = `${prefix}-${index + 1}`;
      return new QueueWorker(
        { ...deps, logger: deps.logger.child(workerId) },
        { ...options, workerId }
      );
    });
  }

  start(): void {
    for (const worker of this.workers) {
      worker.start();
    }
  }

  async stop(): Promise<void> {
    await Promise.all(this.workers.map((worker) => worker.stop()));
  }
}

export type WorkerPoolHandle = {
  pool: WorkerPool;
  close: () => Promise<void>;
};

/**
 * Opens the task store and broker, wires the placeholder workload (one forked
 * process per attempt) and starts `config.concurrency` workers. `close` drains in-flight tasks, then releases
 * both databases.
 */
export function startWorkerPool(
  config: WorkerConfig,
  logger: Logger = createLogger('queue-worker')
): WorkerPoolHandle {
  const taskDb = openTaskDb(config.queue.storeUrl);
  const brokerDb = openBrokerDb(config.queue.brokerUrl);

  const lifecycle = new TaskLifecycle(new TaskStore(taskDb), new RetryPolicy(config.queue.retry));
  const pool = new WorkerPool(
    {
      queue: new WorkQueue(brokerDb),
      lifecycle,
      workload: createIsolatedWorkload({ moduleUrl: workerModuleUrl('heavy-computation'), config: config.workload }),
      logger
    },
    {
      concurrency: config.concurrency,
      pollMs: config.pollMs,
      visibilityTimeoutMs: config.visibilityTimeoutMs,
      executionTimeoutMs: config.executionTimeoutMs
    }
  );

  logger.info('starting', {
    concurrency: config.concurrency,
    task_store: config.queue.storeUrl,
    broker: config.queue.brokerUrl,
    max_attempts: config.queue.retry.maxAttempts,
    retry_backoff: config.queue.retry.backoff,
    retry_delay_ms: config.queue.retry.delayMs
  });
  pool.start();

  return {
    pool,
    close: async () => {
      try {
        await pool.stop();
      } finally {
        taskDb.close();
        brokerDb.close();
      }
    }
  };
}
