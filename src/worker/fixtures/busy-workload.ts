import type { WorkloadConfig } from '../config.js';
import type { Workload } from '../execute.js';

/** Holds the CPU for `minDurationMs`, then returns the epoch ms it started at. */
export function createWorkload(options: WorkloadConfig): Workload {
  return async () => {
    const startedAt = Date.now();
    while (Date.now() - startedAt < options.minDurationMs) {
      // spin
    }
    return startedAt;
  };
}
