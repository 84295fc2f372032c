export type LogFields = Record<string, string | number | boolean | null | undefined>;

export type LogSink = {
  log: (line: string) => void;
  error: (line: string) => void;
};

export type Logger = {
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  child: (scope: string) => Logger;
};

function formatValue(value: string | number | boolean | null): string {
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) || value === '' ? JSON.stringify(value) : value;
  }
  return String(value);
}

export function formatLine(scope: string, message: string, fields?: LogFields): string {
  const parts = [`[${scope}] ${message}`];
  for (const [key, value] of Object.entries(fields ?? {})) {
    if (value === undefined) {
      continue;
    }
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(' ');
}

/**
 * Scoped console logger: `[scope] message key=value`. Warnings and info go to
 * stdout, errors to stderr.
 */
export function createLogger(scope: string, sink: LogSink = console): Logger {
  return {
    info: (message, fields) => sink.log(formatLine(scope, message, fields)),
    warn: (message, fields) => sink.log(formatLine(scope, `WARN ${message}`, fields)),
    error: (message, fields) => sink.error(formatLine(scope, message, fields)),
    child: (child) => createLogger(`${scope}:${child}`, sink)
  };
}

export const silentLogger: Logger = createLogger('silent', {
  log: () => undefined,
  error: () => undefined
});
