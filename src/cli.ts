#!/usr/bin/env node

import { createLogger, type Logger } from './lib/logger.js';
import { parseCommand, positiveIntOption } from './lib/cli-args.js';
import { parseSubmitBody, startGateway, submitTask, toTaskStatusResponse } from './queue/api.js';
import { loadQueueConfig } from './queue/config.js';
import { errorMessage } from './queue/errors.js';
import { openBrokerDb, openTaskDb, type SqliteDb } from './queue/db.js';
import { TaskStore } from './queue/task-store.js';
import { WorkQueue } from './queue/work-queue.js';
import { loadWorkerConfig } from './worker/config.js';
import { startWorkerPool } from './worker/pool.js';

function usage(): string {
  return [
    'Usage:',
    '  taskq gateway',
    '  taskq worker [--concurrency N]',
    '  taskq db:migrate',
    '  taskq status',
    '  taskq tasks:submit [--data \'{"x":1}\']',
    '  taskq tasks:show <task_id>'
  ].join('\n');
}

function withStores<T>(fn: (store: TaskStore, queue: WorkQueue) => T): T {
  const config = loadQueueConfig();
  const dbs: SqliteDb[] = [];
  try {
    const taskDb = openTaskDb(config.storeUrl);
    dbs.push(taskDb);
    const brokerDb = openBrokerDb(config.brokerUrl);
    dbs.push(brokerDb);
    return fn(new TaskStore(taskDb), new WorkQueue(brokerDb));
  } finally {
    for (const db of dbs) {
      db.close();
    }
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function parseDataArg(raw: string | undefined): unknown {
  if (raw === undefined) {
    return {};
  }
  try {
    return { data: JSON.parse(raw) };
  } catch {
    throw new Error('--data must be valid JSON');
  }
}

function onShutdown(close: () => Promise<void>, logger: Logger): void {
  let closing = false;
  const handler = (signal: NodeJS.Signals): void => {
    if (closing) {
      return;
    }
    closing = true;
    logger.info(`received ${signal}, shutting down`);
    close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}

async function main(): Promise<void> {
  const parsed = parseCommand(process.argv.slice(2), ['--concurrency', '--data']);
  const { command } = parsed;

  if (!command || command === '--help' || command === '-h') {
    console.log(usage());
    return;
  }

  if (command === 'gateway') {
    const logger = createLogger('gateway');
    const handle = await startGateway(loadQueueConfig(), logger);
    onShutdown(handle.close, logger);
    return;
  }

  if (command === 'worker') {
    const config = loadWorkerConfig();
    const concurrency = positiveIntOption(parsed, '--concurrency') ?? config.concurrency;
    const logger = createLogger('queue-worker');
    const handle = startWorkerPool({ ...config, concurrency }, logger);
    onShutdown(handle.close, logger);
    return;
  }

  if (command === 'db:migrate') {
    const config = loadQueueConfig();
    withStores(() => undefined);
    console.log(`[db] schema ready: ${config.storeUrl}, ${config.brokerUrl}`);
    return;
  }

  if (command === 'status') {
    printJson(withStores((store, queue) => ({
      tasks: store.countByStatus(),
      queue: queue.stats()
    })));
    return;
  }

  if (command === 'tasks:submit') {
    const payload = parseSubmitBody(parseDataArg(parsed.options.get('--data')));
    const logger = createLogger('cli');
    printJson(withStores((store, queue) => submitTask({ store, queue, logger }, payload)));
    return;
  }

  if (command === 'tasks:show') {
    const taskId = parsed.positional[0];
    if (!taskId) {
      throw new Error('tasks:show requires a task id');
    }
    const task = withStores((store) => store.get(taskId));
    if (!task) {
      throw new Error(`Task not found: ${taskId}`);
    }
    printJson({ ...toTaskStatusResponse(task), last_error: task.last_error, updated_at: task.updated_at });
    return;
  }

  console.error(`Unknown command: ${command}`);
  console.error(usage());
  process.exit(2);
}

main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
