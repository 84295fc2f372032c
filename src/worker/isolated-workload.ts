import { fork } from 'node:child_process';
import { dirname, extname, join } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import type { WorkloadConfig } from './config.js';
import type { Workload } from './execute.js';
import { isWorkloadReply, type WorkloadRequest } from './workload-protocol.js';

const WORKER_DIR = dirname(fileURLToPath(import.meta.url));
// .ts under tsx, .js once built
const MODULE_EXT = extname(fileURLToPath(import.meta.url));
const CHILD_ENTRYPOINT = join(WORKER_DIR, `workload-child${MODULE_EXT}`);

export function workerModuleUrl(name: string): string {
  return pathToFileURL(join(WORKER_DIR, `${name}${MODULE_EXT}`)).href;
}

export type IsolatedWorkloadOptions = {
  /** Module exporting `createWorkload(config)`. */
  moduleUrl: string;
  config: WorkloadConfig;
};

/**
 * Runs every attempt in a forked Node process, so a workload that blocks its
 * event loop cannot stall other workers or their lease heartbeats. Aborting
 * the attempt kills the process.
 */
export function createIsolatedWorkload(options: IsolatedWorkloadOptions): Workload {
  return (payload, context) => new Promise<number>((resolve, reject) => {
    if (context.signal.aborted) {
      reject(new Error('Execution aborted'));
      return;
    }

    const child = fork(CHILD_ENTRYPOINT, []);
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) {
        return;
      }
      settled = true;
      context.signal.removeEventListener('abort', onAbort);
      settle();
    };

    const onAbort = (): void => {
      child.kill('SIGKILL');
      finish(() => reject(new Error('Execution aborted')));
    };
    context.signal.addEventListener('abort', onAbort, { once: true });

    child.on('message', (message: unknown) => {
      if (!isWorkloadReply(message)) {
        return;
      }
      if (message.type === 'progress') {
        context.reportProgress(message.percent);
        return;
      }
      if (message.type === 'result') {
        const { result } = message;
        finish(() => resolve(result));
        return;
      }
      const failure = new Error(message.error);
      finish(() => reject(failure));
    });
    child.on('error', (error) => finish(() => reject(error)));
    child.on('close', (code, signal) => {
      const reason = signal ? `signal ${signal}` : `code ${code ?? 'unknown'}`;
      finish(() => reject(new Error(`Workload process exited without a result (${reason})`)));
    });

    const request: WorkloadRequest = {
      moduleUrl: options.moduleUrl,
      options: options.config,
      payload,
      taskId: context.taskId,
      attempt: context.attempt
    };
    child.send(request, (error) => {
      if (error) {
        child.kill('SIGKILL');
        finish(() => reject(error));
      }
    });
  });
}
