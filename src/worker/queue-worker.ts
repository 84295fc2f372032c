import { sleep } from '../lib/sleep.js';
import type { Logger } from '../lib/logger.js';
import { errorMessage } from '../queue/errors.js';
import type { TaskLifecycle } from '../queue/lifecycle.js';
import type { QueueMessage } from '../queue/types.js';
import type { WorkQueue } from '../queue/work-queue.js';
import { heartbeatIntervalMs } from './config.js';
import { executeWorkload, type Workload } from './execute.js';

export type QueueWorkerDeps = {
  queue: WorkQueue;
  lifecycle: TaskLifecycle;
  workload: Workload;
  logger: Logger;
};

export type QueueWorkerOptions = {
  workerId: string;
  pollMs: number;
  visibilityTimeoutMs: number;
  executionTimeoutMs: number;
};

export type SkipReason = 'duplicate' | 'exhausted' | 'not_found' | 'ignored';

export type ProcessResult =
  | { kind: 'idle' }
  | { kind: 'completed'; taskId: string; result: number }
  | { kind: 'retry_scheduled'; taskId: string; delayMs: number; error: string }
  | { kind: 'failed'; taskId: string; error: string }
  | { kind: 'skipped'; taskId: string; reason: SkipReason }
  | { kind: 'error'; taskId: string | null; error: string };

/**
 * Pulls one message at a time, runs the workload for it and routes the
 * outcome through the lifecycle controller. Infrastructure failures leave the
 * message leased, so the broker hands it out again once the lease expires.
 */
export class QueueWorker {
  private stopping = false;
  private readonly stopController = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(
    private readonly deps: QueueWorkerDeps,
    private readonly options: QueueWorkerOptions
  ) {}

  get id(): string {
    return this.options.workerId;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    this.loop = this.run();
  }

  /** Waits for the task in hand to finish; tasks are never cancelled. */
  async stop(): Promise<void> {
    this.stopping = true;
    this.stopController.abort();
    await this.loop;
    this.loop = null;
  }

  private async run(): Promise<void> {
    const { logger } = this.deps;
    logger.info('started', { worker_id: this.id });
    while (!this.stopping) {
      const result = await this.runOnce();
      if (result.kind === 'idle' || result.kind === 'error') {
        await sleep(this.options.pollMs, this.stopController.signal);
      }
    }
    logger.info('stopped', { worker_id: this.id });
  }

  async runOnce(): Promise<ProcessResult> {
    const { queue, logger } = this.deps;

    let message: QueueMessage | null;
    try {
      message = queue.dequeue(this.id, this.options.visibilityTimeoutMs);
    } catch (error) {
      logger.error('dequeue failed', { worker_id: this.id, error: errorMessage(error) });
      return { kind: 'error', taskId: null, error: errorMessage(error) };
    }

    if (!message) {
      return { kind: 'idle' };
    }

    try {
      return await this.process(message);
    } catch (error) {
      logger.error('processing aborted, message left for redelivery', {
        worker_id: this.id,
        task_id: message.taskId,
        message_id: message.id,
        error: errorMessage(error)
      });
      return { kind: 'error', taskId: message.taskId, error: errorMessage(error) };
    }
  }

  private async process(message: QueueMessage): Promise<ProcessResult> {
    const { queue, lifecycle, workload, logger } = this.deps;
    const taskId = message.taskId;

    const claim = lifecycle.claim(taskId);
    if (claim.kind !== 'claimed') {
      const reason: SkipReason = claim.kind;
      if (reason === 'duplicate') {
        logger.info('task already terminal, dropping redelivered message', { task_id: taskId, message_id: message.id });
      } else if (reason === 'exhausted') {
        logger.warn('attempts exhausted before execution, task failed', { task_id: taskId, message_id: message.id });
      } else {
        logger.warn('message references unknown task, dropping', { task_id: taskId, message_id: message.id });
      }
      this.ack(message);
      return { kind: 'skipped', taskId, reason };
    }

    const attempt = claim.task.attempt_count;
    logger.info('task claimed', {
      worker_id: this.id,
      task_id: taskId,
      attempt,
      max_attempts: lifecycle.maxAttempts,
      delivery: message.deliveries
    });

    const heartbeatTimer = setInterval(() => {
      try {
        if (!queue.extendLease(message.id, this.id, this.options.visibilityTimeoutMs)) {
          logger.warn('lease lost during execution, message may be redelivered', {
            task_id: taskId,
            message_id: message.id
          });
        }
      } catch (error) {
        logger.error('lease heartbeat failed', { task_id: taskId, error: errorMessage(error) });
      }
    }, heartbeatIntervalMs(this.options.visibilityTimeoutMs));

    const outcome = await executeWorkload(workload, message.payload, {
      taskId,
      attempt,
      timeoutMs: this.options.executionTimeoutMs,
      onProgress: (percent) => this.reportProgress(taskId, percent)
    }).finally(() => clearInterval(heartbeatTimer));

    if (outcome.ok) {
      const write = lifecycle.complete(taskId, outcome.result);
      this.ack(message);
      if (write === 'ignored') {
        logger.warn('task already terminal, result discarded', { task_id: taskId, attempt });
        return { kind: 'skipped', taskId, reason: 'ignored' };
      }
      logger.info('task completed', { task_id: taskId, attempt, result: outcome.result });
      return { kind: 'completed', taskId, result: outcome.result };
    }

    const decision = lifecycle.recordFailure(taskId, outcome.error);
    switch (decision.kind) {
      case 'retry':
        if (!queue.requeue(message.id, this.id, decision.delayMs)) {
          logger.warn('lease lost before requeue, relying on redelivery', { task_id: taskId, message_id: message.id });
        }
        logger.warn('attempt failed, retry scheduled', {
          task_id: taskId,
          attempt,
          delay_ms: decision.delayMs,
          error: outcome.error
        });
        return { kind: 'retry_scheduled', taskId, delayMs: decision.delayMs, error: outcome.error };
      case 'failed':
        this.ack(message);
        logger.error('task failed permanently', { task_id: taskId, attempt, error: outcome.error });
        return { kind: 'failed', taskId, error: outcome.error };
      case 'ignored':
        this.ack(message);
        logger.warn('task already terminal, failure discarded', { task_id: taskId, attempt });
        return { kind: 'skipped', taskId, reason: 'ignored' };
    }
  }

  private reportProgress(taskId: string, percent: number): void {
    try {
      this.deps.lifecycle.reportProgress(taskId, percent);
    } catch (error) {
      this.deps.logger.error('progress update failed', { task_id: taskId, error: errorMessage(error) });
    }
  }

  private ack(message: QueueMessage): void {
    if (!this.deps.queue.ack(message.id, this.id)) {
      this.deps.logger.warn('ack skipped, lease no longer held', { task_id: message.taskId, message_id: message.id });
    }
  }
}
