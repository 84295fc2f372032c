import { errorMessage } from '../queue/errors.js';
import type { TaskPayload } from '../queue/types.js';

export type WorkloadContext = {
  taskId: string;
  attempt: number;
  /** Advisory; never changes the outcome of the attempt. */
  reportProgress: (percent: number) => void;
  /** Aborted when the attempt times out. */
  signal: AbortSignal;
};

export type Workload = (payload: TaskPayload, context: WorkloadContext) => Promise<number>;

export type ExecutionOutcome =
  | { ok: true; result: number }
  | { ok: false; error: string };

export type ExecuteOptions = {
  taskId: string;
  attempt: number;
  /** 0 or less runs without a timeout. */
  timeoutMs: number;
  onProgress?: (percent: number) => void;
};

/**
 * Runs one attempt and folds every way it can end (value, throw, rejection,
 * timeout, non-integer value) into an ExecutionOutcome.
 */
export async function executeWorkload(
  workload: Workload,
  payload: TaskPayload,
  options: ExecuteOptions
): Promise<ExecutionOutcome> {
  const controller = new AbortController();
  let settled = false;
  let timeoutHandle: NodeJS.Timeout | null = null;

  const context: WorkloadContext = {
    taskId: options.taskId,
    attempt: options.attempt,
    signal: controller.signal,
    reportProgress: (percent) => {
      if (!settled) {
        options.onProgress?.(percent);
      }
    }
  };

  const run = Promise.resolve()
    .then(() => workload(payload, context))
    .then((result): ExecutionOutcome => {
      if (!Number.isSafeInteger(result)) {
        return { ok: false, error: `Workload returned a non-integer result: ${String(result)}` };
      }
      return { ok: true, result };
    })
    .catch((error: unknown): ExecutionOutcome => ({ ok: false, error: errorMessage(error) }));

  const contenders: Array<Promise<ExecutionOutcome>> = [run];
  if (options.timeoutMs > 0) {
    contenders.push(new Promise<ExecutionOutcome>((resolve) => {
      timeoutHandle = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, error: `Execution timed out after ${options.timeoutMs}ms` });
      }, options.timeoutMs);
    }));
  }

  try {
    return await Promise.race(contenders);
  } finally {
    settled = true;
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}
