export type RetryBackoff = 'fixed' | 'exponential';

export type RetryConfig = {
  maxAttempts: number;
  backoff: RetryBackoff;
  delayMs: number;
  maxDelayMs: number;
};

export type QueueConfig = {
  storeUrl: string;
  brokerUrl: string;
  apiPort: number;
  retry: RetryConfig;
};

type Env = Record<string, string | undefined>;

export function intFromEnv(env: Env, name: string, fallback: number, options: { allowZero?: boolean } = {}): number {
  const value = env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  const min = options.allowZero ? 0 : 1;
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(options.allowZero
      ? `${name} must be a non-negative integer`
      : `${name} must be a positive integer`);
  }
  return parsed;
}

function backoffFromEnv(env: Env): RetryBackoff {
  const value = env.TASK_RETRY_BACKOFF;
  if (!value) {
    return 'fixed';
  }
  if (value !== 'fixed' && value !== 'exponential') {
    throw new Error('TASK_RETRY_BACKOFF must be one of: fixed, exponential');
  }
  return value;
}

/**
 * Resolves a store or broker connection string to something better-sqlite3
 * can open. Accepts bare paths, `:memory:`, `file:` and `sqlite:` URLs.
 */
export function resolveSqlitePath(connection: string): string {
  const trimmed = connection.trim();
  if (!trimmed) {
    throw new Error('connection string must not be empty');
  }
  const match = trimmed.match(/^(?:sqlite|file):(?:\/\/)?(.*)$/i);
  if (!match) {
    return trimmed;
  }
  const rest = match[1];
  if (!rest) {
    throw new Error(`connection string has no path: ${connection}`);
  }
  return rest;
}

export function loadRetryConfig(env: Env = process.env): RetryConfig {
  return {
    maxAttempts: intFromEnv(env, 'TASK_MAX_ATTEMPTS', 3),
    backoff: backoffFromEnv(env),
    delayMs: intFromEnv(env, 'TASK_RETRY_DELAY_MS', 60_000, { allowZero: true }),
    maxDelayMs: intFromEnv(env, 'TASK_RETRY_MAX_DELAY_MS', 3_600_000)
  };
}

export function loadQueueConfig(env: Env = process.env): QueueConfig {
  return {
    storeUrl: resolveSqlitePath(env.TASK_STORE_URL ?? env.DATABASE_URL ?? './data/tasks.sqlite'),
    brokerUrl: resolveSqlitePath(env.QUEUE_BROKER_URL ?? './data/broker.sqlite'),
    apiPort: intFromEnv(env, 'API_PORT', 8000),
    retry: loadRetryConfig(env)
  };
}
