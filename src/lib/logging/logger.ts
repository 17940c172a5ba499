/**
 * Structured Logger
 *
 * Leveled logging with a fixed context per logger and optional bound fields.
 * Outputs JSON lines in production, human-readable lines elsewhere.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  requestId?: string;
  data?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
}

export type LogOptions = {
  requestId?: string;
  data?: Record<string, unknown>;
  error?: unknown;
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && value in LOG_LEVELS;

const isProduction = () => process.env.NODE_ENV === 'production';

function minLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return isProduction() ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel()];
}

function formatEntry(entry: LogEntry): string {
  if (isProduction()) {
    return JSON.stringify(entry);
  }

  const prefix = entry.context ? `[${entry.context}]` : '';
  const reqId = entry.requestId ? ` (req:${entry.requestId.slice(0, 8)})` : '';
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  const errStr = entry.error ? ` err=${entry.error.message}` : '';
  return `${entry.level.toUpperCase()} ${prefix}${reqId} ${entry.message}${dataStr}${errStr}`;
}

function serializeError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) return undefined;
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { message: error.message, stack: error.stack, code };
  }
  if (typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { message: error.message, code };
  }
  return { message: String(error) };
}

function log(level: LogLevel, message: string, context: string, opts?: LogOptions) {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    context,
    requestId: opts?.requestId,
    data: opts?.data,
    error: serializeError(opts?.error),
  };

  const formatted = formatEntry(entry);

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    case 'debug':
      console.debug(formatted);
      break;
    default:
      console.log(formatted);
  }
}

export interface Logger {
  debug: (message: string, opts?: LogOptions) => void;
  info: (message: string, opts?: LogOptions) => void;
  warn: (message: string, opts?: LogOptions) => void;
  error: (message: string, opts?: LogOptions) => void;
  /** Logger whose entries always include `bindings` in their data. */
  child: (bindings: Record<string, unknown>) => Logger;
}

/**
 * Create a logger with a fixed context prefix.
 *
 * @example
 * const log = createLogger('EnvironmentLifecycle');
 * log.info('Environment running', { data: { environmentId: 'abc' } });
 */
export function createLogger(context: string, bindings?: Record<string, unknown>): Logger {
  const withBindings = (opts?: LogOptions): LogOptions | undefined =>
    bindings ? { ...opts, data: { ...bindings, ...opts?.data } } : opts;

  return {
    debug: (message, opts) => log('debug', message, context, withBindings(opts)),
    info: (message, opts) => log('info', message, context, withBindings(opts)),
    warn: (message, opts) => log('warn', message, context, withBindings(opts)),
    error: (message, opts) => log('error', message, context, withBindings(opts)),
    child: (extra) => createLogger(context, { ...bindings, ...extra }),
  };
}
