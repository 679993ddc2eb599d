import express, { type RequestHandler } from 'express';
import type { PluginRuntime } from '../../../app/src/runtime.js';
import { createPluginsRouter } from '../../routes/plugins.js';

/** Guard stand-in that lets every request through */
export const allowAll: RequestHandler = (_req, _res, next) => next();

/**
 * Create a minimal Express app for testing a router.
 * Mounts express.json() middleware and the given router at /api/plugins.
 */
export function createTestApp(router: express.Router): express.Application {
  const app = express();
  app.use(express.json({ limit: '2mb' }));
  app.use('/api/plugins', router);
  return app;
}

/** The plugins router over `runtime` with both guards open. */
export function createPluginsTestApp(runtime: PluginRuntime): express.Application {
  return createTestApp(
    createPluginsRouter({ runtime, requireUser: allowAll, requireAdmin: allowAll }),
  );
}
