import { type Request, type Response, type NextFunction } from 'express';
import { type ZodType, ZodError } from 'zod';

/** The parts of a request a route can declare a schema for */
export type RequestPart = 'params' | 'query' | 'body';

export type RequestSchemas = Partial<Record<RequestPart, ZodType>>;

// Params first: a bad plugin name is reported before anything about the body
const PART_ORDER: readonly RequestPart[] = ['params', 'query', 'body'];

/**
 * One line per failure. A lone missing field reads
 * "Missing required field: <path>"; anything else is the issue messages,
 * comma-separated.
 */
export function formatZodError(error: ZodError): string {
  const [first, ...rest] = error.issues;
  if (first && rest.length === 0) {
    const field = first.path.join('.');
    // Zod v4 reports an absent key as invalid_type with "received undefined"
    if (first.code === 'invalid_type' && field && first.message.includes('received undefined')) {
      return `Missing required field: ${field}`;
    }
    return first.message;
  }
  return error.issues.map((issue) => issue.message).join(', ');
}

/** The 400 envelope for a request that failed its schema */
export function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({ error: formatZodError(error), code: 'ValidationFailed' });
}

function assignPart(req: Request, part: RequestPart, value: unknown): void {
  switch (part) {
    case 'body':
      req.body = value;
      return;
    case 'params':
      if (typeof value === 'object' && value !== null) Object.assign(req.params, value);
      return;
    case 'query':
      // Express 5 exposes req.query through a getter; shadow it on the instance
      Object.defineProperty(req, 'query', {
        value,
        writable: true,
        configurable: true,
        enumerable: true,
      });
      return;
  }
}

/**
 * Route middleware: parse each declared request part with its schema and
 * replace the raw value with the parsed one, defaults and transforms applied.
 * The first failing part ends the request with a ValidationFailed 400.
 */
export function validate(schemas: RequestSchemas) {
  return (req: Request, res: Response, next: NextFunction): void => {
    for (const part of PART_ORDER) {
      const schema = schemas[part];
      if (!schema) continue;
      const parsed = schema.safeParse(req[part]);
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }
      assignPart(req, part, parsed.data);
    }
    next();
  };
}
