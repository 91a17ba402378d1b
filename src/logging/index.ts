/**
 * Structured JSON logging
 *
 * One line per entry on the console, tagged with the module that wrote it and
 * the id of the request being served. Credentials are masked before output.
 *
 *   const log = createLogger('auth');
 *   log.info('User logged in', { userId });
 *   log.warn('Shared cache unavailable', { error: err });
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function toLevel(value: string | undefined): LogLevel {
  const found = LOG_LEVELS.find((level) => level === value);
  return found ?? 'info';
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export const LOG_CONFIG: { level: LogLevel; service: string; pretty: boolean } = {
  level: toLevel(process.env.LOG_LEVEL),
  service: process.env.LOG_SERVICE || 'kanban-gate',
  pretty: process.env.LOG_PRETTY === 'true',
};

/**
 * Unknown names fall back to info
 */
export function setLogLevel(level: string): void {
  LOG_CONFIG.level = toLevel(level);
}

export type LogMetadata = Record<string, unknown>;

export interface LogEntry extends LogMetadata {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  module?: string;
  requestId?: string;
}

export interface Logger {
  debug(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  error(message: string, meta?: LogMetadata | Error): void;
  child(bindings: LogMetadata): Logger;
}

// ==================== Request correlation ====================

const requestIds = new AsyncLocalStorage<string>();

export function withCorrelationId<T>(requestId: string, fn: () => T): T {
  return requestIds.run(requestId, fn);
}

export function getCorrelationId(): string | undefined {
  return requestIds.getStore();
}

// ==================== Redaction ====================

// Compared after lowercasing and removing '-' and '_'
const CREDENTIAL_KEY =
  /^(password|passwordhash|currentpassword|newpassword|secret|sessionsecret|salt|token|bearertoken|csrftoken|xcsrftoken|apikey|xapikey|authorization|cookie|setcookie|credentials?)$/;

const CREDENTIAL_VALUES = [
  /^sk_[\w-]{20,}$/,
  /^eyJ[\w-]+\.eyJ[\w-]+\./,
  /^Bearer\s+\S{20,}$/i,
];

function redact(key: string, value: unknown, depth: number): unknown {
  if (CREDENTIAL_KEY.test(key.toLowerCase().replace(/[-_]/g, ''))) {
    return '[REDACTED]';
  }
  if (typeof value === 'string') {
    return CREDENTIAL_VALUES.some((pattern) => pattern.test(value))
      ? `[REDACTED ${value.length} chars]`
      : value;
  }
  if (value === null || typeof value !== 'object' || value instanceof Date) {
    return value;
  }
  if (depth >= 5) {
    return '[truncated]';
  }
  if (Array.isArray(value)) {
    return value.map((item) => redact('', item, depth + 1));
  }
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, redact(k, v, depth + 1)]));
}

export function sanitizeMetadata(meta: LogMetadata): LogMetadata {
  return Object.fromEntries(Object.entries(meta).map(([k, v]) => [k, redact(k, v, 0)]));
}

// ==================== Output ====================

function describeError(error: Error): LogMetadata {
  return { errorName: error.name, errorMessage: error.message, stack: error.stack };
}

function flatten(meta: LogMetadata | Error | undefined): LogMetadata {
  if (meta === undefined) return {};
  if (meta instanceof Error) return describeError(meta);
  const { error, ...rest } = meta;
  if (error instanceof Error) return { ...rest, ...describeError(error) };
  return meta;
}

function write(entry: LogEntry): void {
  const line = LOG_CONFIG.pretty ? JSON.stringify(entry, null, 2) : JSON.stringify(entry);
  if (entry.level === 'error') console.error(line);
  else if (entry.level === 'warn') console.warn(line);
  else console.log(line);
}

function buildLogger(bindings: LogMetadata): Logger {
  const emit = (level: LogLevel, message: string, meta?: LogMetadata | Error): void => {
    if (rank(level) < rank(LOG_CONFIG.level)) return;

    const requestId = getCorrelationId();
    write({
      timestamp: new Date().toISOString(),
      level,
      service: LOG_CONFIG.service,
      message,
      ...(requestId ? { requestId } : {}),
      ...bindings,
      ...sanitizeMetadata(flatten(meta)),
    });
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    child: (extra) => buildLogger({ ...bindings, ...extra }),
  };
}

export const logger = buildLogger({});

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
