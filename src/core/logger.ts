import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogSource = 'cli' | 'config' | 'report' | 'wms';

export type LogWriter = (line: string) => void;

export type Logger = {
  debug: (message: string, details?: Record<string, unknown>) => void;
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, options?: { details?: Record<string, unknown>; error?: unknown }) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const defaultWriter: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

let threshold: LogLevel = 'warn';
let writer: LogWriter = defaultWriter;

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/** Redirects log output; returns a function that restores the previous writer. */
export function setLogWriter(next: LogWriter): () => void {
  const previous = writer;
  writer = next;
  return () => {
    writer = previous;
  };
}

export function createLogger(options: { source: LogSource }): Logger {
  const { source } = options;

  const emit = (
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    extra?: { details?: Record<string, unknown>; error?: unknown },
  ): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const prefix = chalk.dim(`[${level}] ${source}:`);
    const parts = [`${prefix} ${message}`];
    if (extra?.details) {
      parts.push(JSON.stringify(extra.details));
    }
    if (extra?.error !== undefined) {
      parts.push(formatError(extra.error));
    }
    writer(parts.join(' '));
  };

  return {
    debug: (message, details) =>
      emit('debug', message, details === undefined ? undefined : { details }),
    info: (message, details) =>
      emit('info', message, details === undefined ? undefined : { details }),
    warn: (message, details) =>
      emit('warn', message, details === undefined ? undefined : { details }),
    error: (message, extra) => emit('error', message, extra),
  };
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? error.message;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}
