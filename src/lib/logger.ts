/**
 * ListingSync: Logger
 *
 * Structured logging utility.
 * JSON lines in production, one readable line per entry otherwise.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(defaultContext: LogContext): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

// Read per call so tests and scripts can change LOG_LEVEL at runtime
function currentLevelNum(): number {
  const level = process.env.LOG_LEVEL ?? 'info';
  return isLogLevel(level) ? LOG_LEVELS[level] : LOG_LEVELS.info;
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LOG_LEVELS[level] < currentLevelNum()) return;

  const formatted = formatEntry({
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  });

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

function createLogger(defaultContext?: LogContext): Logger {
  const merge = (context?: LogContext): LogContext | undefined =>
    defaultContext ? { ...defaultContext, ...context } : context;

  return {
    debug: (message, context) => log('debug', message, merge(context)),
    info: (message, context) => log('info', message, merge(context)),
    warn: (message, context) => log('warn', message, merge(context)),
    error: (message, context) => log('error', message, merge(context)),
    child: (childContext) => createLogger({ ...defaultContext, ...childContext }),
  };
}

export const logger: Logger = createLogger();

/**
 * Error message for log context, whatever was thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run an async operation and log its duration at debug level.
 */
export async function timeOperation<T>(
  name: string,
  operation: () => Promise<T>,
  log: Logger = logger
): Promise<T> {
  const start = performance.now();

  try {
    return await operation();
  } finally {
    log.debug(`${name} completed`, { durationMs: Math.round(performance.now() - start) });
  }
}
