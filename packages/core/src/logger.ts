/**
 * Simple levelled console logger.
 *
 * Call shape is `logger.level(data, message)`: structured data first, then a
 * human-readable message.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in levels;
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL)
  ? process.env.LOG_LEVEL
  : 'info';

/** Change the minimum level at runtime. Unknown values are ignored. */
export function setLogLevel(level: string): void {
  if (isLogLevel(level)) {
    currentLevel = level;
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[currentLevel];
}

const SENSITIVE_KEYS = /key|token|secret|password|credential|auth/i;

export function maskSensitiveData(obj: unknown): unknown {
  if (typeof obj !== 'object' || obj === null) return obj;
  if (Array.isArray(obj)) return obj.map(maskSensitiveData);
  const masked: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    masked[k] =
      SENSITIVE_KEYS.test(k) && typeof v === 'string' ? '[REDACTED]' : v;
  }
  return masked;
}

function formatData(data: unknown): string {
  if (typeof data === 'string') return data;
  if (typeof data === 'object') {
    return JSON.stringify(maskSensitiveData(data), (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value,
    );
  }
  return String(data);
}

export interface Logger {
  debug(data: unknown, msg?: string): void;
  info(data: unknown, msg?: string): void;
  warn(data: unknown, msg?: string): void;
  error(data: unknown, msg?: string): void;
}

export const logger: Logger = {
  debug: (data, msg) => {
    if (shouldLog('debug')) {
      console.log(`[DEBUG] ${msg || ''} ${formatData(data)}`);
    }
  },
  info: (data, msg) => {
    if (shouldLog('info')) {
      console.log(`[INFO] ${msg || ''} ${formatData(data)}`);
    }
  },
  warn: (data, msg) => {
    if (shouldLog('warn')) {
      console.warn(`[WARN] ${msg || ''} ${formatData(data)}`);
    }
  },
  error: (data, msg) => {
    if (shouldLog('error')) {
      console.error(`[ERROR] ${msg || ''} ${formatData(data)}`);
    }
  },
};
