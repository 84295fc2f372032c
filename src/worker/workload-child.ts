import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../queue/errors.js';
import { isWorkloadModule, isWorkloadRequest, type WorkloadReply } from './workload-protocol.js';

const logger = createLogger('workload');

function reply(message: WorkloadReply): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!process.send) {
      reject(new Error('workload process started without an IPC channel'));
      return;
    }
    process.send(message, undefined, {}, (error) => (error ? reject(error) : resolve()));
  });
}

async function run(request: unknown): Promise<WorkloadReply> {
  if (!isWorkloadRequest(request)) {
    return { type: 'error', error: 'Malformed workload request' };
  }

  const loaded: unknown = await import(request.moduleUrl);
  if (!isWorkloadModule(loaded)) {
    return { type: 'error', error: `${request.moduleUrl} does not export createWorkload` };
  }

  const workload = loaded.createWorkload(request.options);
  try {
    const result = await workload(request.payload, {
      taskId: request.taskId,
      attempt: request.attempt,
      // the parent kills this process on timeout
      signal: new AbortController().signal,
      reportProgress: (percent) => {
        process.send?.({ type: 'progress', percent } satisfies WorkloadReply);
      }
    });
    return { type: 'result', result };
  } catch (error) {
    return { type: 'error', error: errorMessage(error) };
  }
}

process.once('message', (request: unknown) => {
  run(request)
    .catch((error: unknown): WorkloadReply => ({ type: 'error', error: errorMessage(error) }))
    .then(reply)
    .then(() => process.disconnect())
    .catch((error: unknown) => {
      logger.error('reply failed', { error: errorMessage(error) });
      process.exit(1);
    });
});
