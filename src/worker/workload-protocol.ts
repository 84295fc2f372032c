import type { TaskPayload } from '../queue/types.js';
import type { WorkloadConfig } from './config.js';
import type { Workload } from './execute.js';

/** Sent once by the worker to a freshly forked workload process. */
export type WorkloadRequest = {
  moduleUrl: string;
  options: WorkloadConfig;
  payload: TaskPayload;
  taskId: string;
  attempt: number;
};

export type WorkloadReply =
  | { type: 'progress'; percent: number }
  | { type: 'result'; result: number }
  | { type: 'error'; error: string };

/** A module a workload process can load: it builds the workload from its config. */
export type WorkloadModule = {
  createWorkload: (options: WorkloadConfig) => Workload;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWorkloadConfig(value: unknown): value is WorkloadConfig {
  return isRecord(value)
    && typeof value.minDurationMs === 'number'
    && typeof value.maxDurationMs === 'number'
    && typeof value.stepMs === 'number'
    && typeof value.failureRate === 'number';
}

export function isWorkloadRequest(value: unknown): value is WorkloadRequest {
  return isRecord(value)
    && typeof value.moduleUrl === 'string'
    && isWorkloadConfig(value.options)
    && (value.payload === null || isRecord(value.payload))
    && typeof value.taskId === 'string'
    && typeof value.attempt === 'number';
}

export function isWorkloadReply(value: unknown): value is WorkloadReply {
  if (!isRecord(value)) {
    return false;
  }
  switch (value.type) {
    case 'progress':
      return typeof value.percent === 'number';
    case 'result':
      return typeof value.result === 'number';
    case 'error':
      return typeof value.error === 'string';
    default:
      return false;
  }
}

export function isWorkloadModule(value: unknown): value is WorkloadModule {
  return typeof value === 'object'
    && value !== null
    && 'createWorkload' in value
    && typeof value.createWorkload === 'function';
}
