import { intFromEnv, loadQueueConfig, type QueueConfig } from '../queue/config.js';

export type WorkloadConfig = {
  minDurationMs: number;
  maxDurationMs: number;
  stepMs: number;
  failureRate: number;
};

export type WorkerConfig = {
  queue: QueueConfig;
  concurrency: number;
  pollMs: number;
  visibilityTimeoutMs: number;
  /** 0 disables the per-attempt timeout. */
  executionTimeoutMs: number;
  workload: WorkloadConfig;
};

type Env = Record<string, string | undefined>;

/** Leases are renewed every third of the timeout; shorter leases would renew in a busy loop. */
export const MIN_VISIBILITY_TIMEOUT_MS = 1000;

export function heartbeatIntervalMs(visibilityTimeoutMs: number): number {
  return Math.max(1, Math.floor(visibilityTimeoutMs / 3));
}

function rateFromEnv(env: Env, name: string, fallback: number): number {
  const value = env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`${name} must be a number between 0 and 1`);
  }
  return parsed;
}

export function loadWorkloadConfig(env: Env = process.env): WorkloadConfig {
  const minDurationMs = intFromEnv(env, 'WORKLOAD_MIN_MS', 5000, { allowZero: true });
  const maxDurationMs = intFromEnv(env, 'WORKLOAD_MAX_MS', 10_000, { allowZero: true });
  if (maxDurationMs < minDurationMs) {
    throw new Error('WORKLOAD_MAX_MS must not be less than WORKLOAD_MIN_MS');
  }
  return {
    minDurationMs,
    maxDurationMs,
    stepMs: intFromEnv(env, 'WORKLOAD_STEP_MS', 1000),
    failureRate: rateFromEnv(env, 'WORKLOAD_FAILURE_RATE', 0)
  };
}

export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  const visibilityTimeoutMs = intFromEnv(env, 'WORKER_VISIBILITY_TIMEOUT_MS', 120_000);
  if (visibilityTimeoutMs < MIN_VISIBILITY_TIMEOUT_MS) {
    throw new Error(`WORKER_VISIBILITY_TIMEOUT_MS must be at least ${MIN_VISIBILITY_TIMEOUT_MS}`);
  }
  return {
    queue: loadQueueConfig(env),
    concurrency: intFromEnv(env, 'WORKER_CONCURRENCY', 2),
    pollMs: intFromEnv(env, 'WORKER_POLL_MS', 1000),
    visibilityTimeoutMs,
    executionTimeoutMs: intFromEnv(env, 'TASK_EXECUTION_TIMEOUT_MS', 0, { allowZero: true }),
    workload: loadWorkloadConfig(env)
  };
}
