import express, { type ErrorRequestHandler, type RequestHandler } from 'express';
import { createServer } from 'http';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { logger, safeCompare } from '@plugin-runtime/core';
import type { PluginRuntime } from '../app/src/runtime.js';
import { createPluginsRouter } from './routes/plugins.js';

export interface ServerOptions {
  runtime: PluginRuntime;
  /** Requests per minute per client on /api (default: 300) */
  rateLimitPerMinute?: number;
}

/**
 * Builds a guard checking the `x-api-key` header against any of `keys`.
 * With no keys configured every request passes.
 */
export function createApiKeyGuard(keys: Array<string | undefined>): RequestHandler {
  const accepted = keys.filter((key): key is string => Boolean(key));
  return (req, res, next) => {
    if (accepted.length === 0) return next();
    const provided = String(req.headers['x-api-key'] || '');
    if (!accepted.some((key) => safeCompare(provided, key))) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}

function errorStatus(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function createPluginServer(options: ServerOptions) {
  const { runtime, rateLimitPerMinute = 300 } = options;
  const { host, port, corsOrigins, apiKey, adminApiKey } = runtime.config.server;

  const app = express();
  const server = createServer(app);

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || corsOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error('Not allowed by CORS'));
        }
      },
    }),
  );
  // base64 inflates uploads by a third
  const jsonLimit = Math.ceil((runtime.config.maxPluginSizeBytes * 4) / 3) + 64 * 1024;
  app.use(express.json({ limit: jsonLimit }));

  app.use(
    '/api',
    rateLimit({
      windowMs: 60 * 1000,
      max: rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many requests, please try again later' },
    }),
  );

  // The admin key also satisfies user-level checks
  const requireUser = createApiKeyGuard(apiKey || adminApiKey ? [apiKey, adminApiKey] : []);
  const requireAdmin = createApiKeyGuard(adminApiKey ? [adminApiKey] : [apiKey]);

  app.get('/api/health', (_req, res) => {
    res.json({ data: { status: 'ok', plugins: runtime.registry.list().enabledCount } });
  });

  app.use('/api/plugins', createPluginsRouter({ runtime, requireUser, requireAdmin }));

  const handleError: ErrorRequestHandler = (err, req, res, _next) => {
    const status = errorStatus(err);
    if (status >= 500) {
      logger.error({ err, path: req.path }, 'Unhandled request error');
      res.status(status).json({ error: 'Internal server error' });
      return;
    }
    res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
  };
  app.use(handleError);

  function start(): Promise<void> {
    return new Promise((resolve) => {
      server.listen(port, host, () => {
        logger.info({ port, host }, 'Plugin runtime server started');
        resolve();
      });
    });
  }

  function stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        logger.info('Plugin runtime server stopped');
        resolve();
      });
    });
  }

  return { app, server, start, stop };
}
