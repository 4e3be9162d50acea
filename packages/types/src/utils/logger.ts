/**
 * Leveled stderr logger.
 *
 * Lines follow the `[LEVEL] message` convention the CLI prints, with the
 * component scope after the level and any structured context appended as
 * JSON: `[WARN] [pdf-extract] Could not open document {"path":"a.pdf"}`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVEL_ENV = 'BANKSTMT_LOG_LEVEL';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(value: string | undefined = process.env[LOG_LEVEL_ENV]): LogLevel {
  if (value === undefined || value === '') return 'info';
  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

function formatLine(level: LogLevel, scope: string, message: string, context?: LogContext): string {
  const prefix = `[${level.toUpperCase()}] [${scope}] ${message}`;
  if (context === undefined || Object.keys(context).length === 0) {
    return prefix;
  }
  return `${prefix} ${JSON.stringify(context)}`;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel();
  const sink = options.sink ?? stderrSink;
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    scope,
    debug: (message, context) => {
      if (enabled('debug')) sink(formatLine('debug', scope, message, context));
    },
    info: (message, context) => {
      if (enabled('info')) sink(formatLine('info', scope, message, context));
    },
    warn: (message, context) => {
      if (enabled('warn')) sink(formatLine('warn', scope, message, context));
    },
    error: (message, error, context) => {
      if (!enabled('error')) return;
      const errorContext: LogContext = { ...context };
      if (error !== undefined) {
        errorContext['error'] = error instanceof Error ? error.message : String(error);
      }
      sink(formatLine('error', scope, message, errorContext));
    },
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, sink }),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger('silent', { level: 'silent', sink: () => undefined });
