import { createHash } from 'node:crypto';
import { sleep } from '../lib/sleep.js';
import type { TaskPayload } from '../queue/types.js';
import type { WorkloadConfig } from './config.js';
import type { Workload } from './execute.js';

export const SIMULATED_FAILURE_ERROR = 'Simulated transient failure';

export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/** Key order does not affect the hash. */
export function payloadHash(data: Record<string, unknown>): number {
  const digest = createHash('sha256').update(stableStringify(data)).digest('hex');
  return parseInt(digest.slice(0, 12), 16) % 1000;
}

function sumBelow(limit: number): number {
  let total = 0;
  for (let i = 0; i < limit; i += 1) {
    total += i;
  }
  return total;
}

export function computeResult(payload: TaskPayload): number {
  let result = sumBelow(1_000_000);
  if (payload && Object.keys(payload).length > 0) {
    result += payloadHash(payload);
  }
  return result;
}

export type HeavyComputationOptions = WorkloadConfig & {
  random?: () => number;
};

/**
 * Placeholder workload: sleeps for a random duration in steps, reporting
 * progress after each, then sums 0..999999 and folds in a hash of the input.
 */
export function createHeavyComputation(options: HeavyComputationOptions): Workload {
  const random = options.random ?? Math.random;

  return async (payload, context) => {
    if (options.failureRate > 0 && random() < options.failureRate) {
      throw new Error(SIMULATED_FAILURE_ERROR);
    }

    const span = options.maxDurationMs - options.minDurationMs;
    const durationMs = options.minDurationMs + random() * span;
    const steps = Math.floor(durationMs / options.stepMs);

    for (let i = 0; i < steps; i += 1) {
      await sleep(options.stepMs, context.signal);
      if (context.signal.aborted) {
        throw new Error('Execution aborted');
      }
      context.reportProgress(Math.min(100, ((i + 1) * options.stepMs / durationMs) * 100));
    }

    return computeResult(payload);
  };
}

/** Entry point for workload processes, see isolated-workload.ts. */
export function createWorkload(options: WorkloadConfig): Workload {
  return createHeavyComputation(options);
}
