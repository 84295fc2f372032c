import { randomUUID } from 'node:crypto';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { createLogger, type Logger } from '../lib/logger.js';
import type { QueueConfig } from './config.js';
import { openBrokerDb, openTaskDb } from './db.js';
import { RequestValidationError, errorMessage } from './errors.js';
import { TaskStore } from './task-store.js';
import type { TaskPayload, TaskRow, TaskStatus } from './types.js';
import { WorkQueue } from './work-queue.js';

const MAX_BODY_BYTES = 1024 * 1024;

export const ENQUEUE_FAILED_ERROR = 'Failed to enqueue task';

export type SubmitResponse = {
  task_id: string;
  status: 'pending';
  message: string;
};

export type TaskStatusResponse = {
  task_id: string;
  status: TaskStatus;
  result: number | null;
  error_message: string | null;
  created_at: string;
  completed_at: string | null;
  attempt_count: number;
  progress: number | null;
};

export type GatewayDeps = {
  store: TaskStore;
  queue: WorkQueue;
  logger: Logger;
  generateId?: () => string;
};

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  const serialized = JSON.stringify(body);
  res.writeHead(statusCode, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(serialized)
  });
  res.end(serialized);
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new RequestValidationError('Request body too large', 413);
    }
    chunks.push(buffer);
  }
  if (chunks.length === 0) {
    return {};
  }
  const raw = Buffer.concat(chunks).toString('utf8');
  if (!raw.trim()) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new RequestValidationError('Request body must be valid JSON');
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseSubmitBody(body: unknown): TaskPayload {
  if (!isPlainObject(body)) {
    throw new RequestValidationError('Request body must be a JSON object');
  }
  const data = body.data;
  if (data === undefined || data === null) {
    return null;
  }
  if (!isPlainObject(data)) {
    throw new RequestValidationError('data must be an object or null');
  }
  return data;
}

export function toTaskStatusResponse(task: TaskRow): TaskStatusResponse {
  return {
    task_id: task.id,
    status: task.status,
    result: task.result,
    error_message: task.error_message,
    created_at: task.created_at,
    completed_at: task.completed_at,
    attempt_count: task.attempt_count,
    progress: task.progress
  };
}

function decodeTaskId(raw: string): string | null {
  try {
    return decodeURIComponent(raw);
  } catch {
    return null;
  }
}

/**
 * Creates the pending record, then enqueues. If the enqueue fails the record
 * is failed at once so it cannot sit in `pending` forever.
 */
export function submitTask(deps: GatewayDeps, payload: TaskPayload): SubmitResponse {
  const { store, queue, logger } = deps;
  const taskId = (deps.generateId ?? randomUUID)();
  store.create(taskId);

  try {
    queue.enqueue(taskId, payload);
  } catch (error) {
    logger.error('enqueue failed', { task_id: taskId, error: errorMessage(error) });
    try {
      store.fail(taskId, ENQUEUE_FAILED_ERROR);
    } catch (failError) {
      logger.error('could not fail unqueued task', { task_id: taskId, error: errorMessage(failError) });
    }
    throw error;
  }

  logger.info('task queued', { task_id: taskId });
  return { task_id: taskId, status: 'pending', message: 'Task queued for processing' };
}

export function createGatewayServer(deps: GatewayDeps): Server {
  const { store, logger } = deps;

  return createServer(async (req, res) => {
    const method = req.method ?? 'GET';
    try {
      const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

      if (method === 'GET' && url.pathname === '/health') {
        sendJson(res, 200, { status: 'ok' });
        return;
      }

      if (method === 'POST' && url.pathname === '/process') {
        const payload = parseSubmitBody(await readJsonBody(req));
        sendJson(res, 200, submitTask(deps, payload));
        return;
      }

      const resultMatch = url.pathname.match(/^\/results\/([^/]+)$/);
      if (method === 'GET' && resultMatch) {
        const taskId = decodeTaskId(resultMatch[1]);
        const task = taskId ? store.get(taskId) : null;
        if (!task) {
          sendJson(res, 404, { detail: 'Task not found' });
          return;
        }
        sendJson(res, 200, toTaskStatusResponse(task));
        return;
      }

      sendJson(res, 404, { detail: 'Not Found' });
    } catch (error) {
      if (error instanceof RequestValidationError) {
        sendJson(res, error.statusCode, { detail: error.message });
        return;
      }
      logger.error('request failed', { method, url: req.url, error: errorMessage(error) });
      sendJson(res, 500, { detail: 'Internal Server Error' });
    }
  });
}

export type GatewayHandle = {
  server: Server;
  port: number;
  close: () => Promise<void>;
};

/**
 * Opens the task store and broker, then listens. `close` stops accepting
 * requests and releases both databases.
 */
export async function startGateway(
  config: QueueConfig,
  logger: Logger = createLogger('gateway')
): Promise<GatewayHandle> {
  const taskDb = openTaskDb(config.storeUrl);
  const brokerDb = openBrokerDb(config.brokerUrl);
  const server = createGatewayServer({
    store: new TaskStore(taskDb),
    queue: new WorkQueue(brokerDb),
    logger
  });

  try {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(config.apiPort, () => {
        server.off('error', reject);
        resolve();
      });
    });
  } catch (error) {
    taskDb.close();
    brokerDb.close();
    throw error;
  }

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.apiPort;
  logger.info(`listening on http://localhost:${port}`);
  logger.info(`task store: ${config.storeUrl}`);
  logger.info(`broker: ${config.brokerUrl}`);

  return {
    server,
    port,
    close: () => new Promise<void>((resolve, reject) => {
      server.close((error) => {
        taskDb.close();
        brokerDb.close();
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    })
  };
}
