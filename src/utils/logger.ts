/**
 * Structured console logger
 * One line per entry: [timestamp] LEVEL [scope]: message {metadata}
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

interface LogEntry {
  level: LogLevel;
  scope?: string;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

function parseLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  return Object.values(LogLevel).find(level => level === upper) ?? LogLevel.INFO;
}

let minimumLevel = parseLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function formatLog(entry: LogEntry): string {
  const scopeStr = entry.scope ? ` [${entry.scope}]` : '';
  const metadataStr = entry.metadata && Object.keys(entry.metadata).length > 0
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}${scopeStr}: ${entry.message}${metadataStr}`;
}

export function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return error;
}

function write(level: LogLevel, scope: string | undefined, message: string, metadata?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }
  const line = formatLog({
    level,
    scope,
    message,
    timestamp: new Date().toISOString(),
    metadata,
  });
  if (level === LogLevel.ERROR) {
    console.error(line);
  } else if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function createLogger(scope?: string): Logger {
  return {
    debug(message, metadata) {
      write(LogLevel.DEBUG, scope, message, metadata);
    },
    info(message, metadata) {
      write(LogLevel.INFO, scope, message, metadata);
    },
    warn(message, metadata) {
      write(LogLevel.WARN, scope, message, metadata);
    },
    error(message, error, metadata) {
      write(LogLevel.ERROR, scope, message, {
        ...metadata,
        ...(error === undefined ? {} : { error: serializeError(error) }),
      });
    },
    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger: Logger = createLogger();
