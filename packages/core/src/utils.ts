import fs from 'fs';
import path from 'path';
import type { ZodType } from 'zod';
import { logger } from './logger.js';

/**
 * Read and validate a JSON file. Missing, unparsable or invalid content
 * yields `defaultValue`.
 */
export function loadJson<T>(
  filePath: string,
  schema: ZodType<T>,
  defaultValue: T,
): T {
  try {
    if (fs.existsSync(filePath)) {
      const result = schema.safeParse(
        JSON.parse(fs.readFileSync(filePath, 'utf-8')),
      );
      if (result.success) return result.data;
    }
  } catch (err) {
    logger.warn({ filePath, err }, 'Unreadable JSON file, using default');
  }
  return defaultValue;
}

let tmpCounter = 0;

/**
 * Write `data` as pretty JSON. The content goes to a sibling temp file that
 * is then renamed over `filePath`, so readers see the old or the new file.
 */
export function saveJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.${++tmpCounter}.tmp`;
  try {
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2));
    fs.renameSync(tmpPath, filePath);
  } finally {
    fs.rmSync(tmpPath, { force: true });
  }
}

/**
 * Format an error for structured logging.
 * Extracts message, stack, and name from Error objects, including errors
 * thrown from another realm (e.g. a `vm` context) where `instanceof Error`
 * does not hold.
 */
export function formatError(err: unknown): {
  message: string;
  stack?: string;
  name?: string;
} {
  if (err instanceof Error) {
    return {
      message: err.message,
      stack: err.stack,
      name: err.name,
    };
  }
  if (
    typeof err === 'object' &&
    err !== null &&
    'message' in err &&
    typeof err.message === 'string'
  ) {
    return {
      message: err.message,
      stack: 'stack' in err && typeof err.stack === 'string' ? err.stack : undefined,
      name: 'name' in err && typeof err.name === 'string' ? err.name : undefined,
    };
  }
  return { message: String(err) };
}

export function errorMessage(err: unknown): string {
  return formatError(err).message;
}
