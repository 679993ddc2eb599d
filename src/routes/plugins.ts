import express, { Router, type RequestHandler, type Response } from 'express';
import type { PluginRuntimeError } from '@plugin-runtime/core';
import type { PluginRuntime } from '../../app/src/runtime.js';
import { sendValidationError, validate } from '../middleware/validate.js';
import {
  configUpdateBody,
  executeBody,
  hookNameParams,
  hookRegisterBody,
  hookTriggerBody,
  installBody,
  pluginNameParams,
  uploadQuery,
  type ConfigUpdateBody,
  type ExecuteBody,
  type HookRegisterBody,
  type HookTriggerBody,
  type InstallBody,
} from '../schemas/plugins.js';

interface PluginsRouterDeps {
  runtime: PluginRuntime;
  /** Guards read-only endpoints and action execution */
  requireUser: RequestHandler;
  /** Guards lifecycle, install and hook management endpoints */
  requireAdmin: RequestHandler;
}

type FailureKind = 'OperationFailed' | 'InstallFailed' | 'RegistrationFailed';

function sendFailure(
  res: Response,
  status: number,
  kind: FailureKind,
  error: PluginRuntimeError,
): void {
  res.status(status).json({ error: error.message, code: kind, reason: error.code });
}

export function createPluginsRouter(deps: PluginsRouterDeps): Router {
  const { runtime, requireUser, requireAdmin } = deps;
  const { registry, dispatcher, hooks, installer } = runtime;
  const router = Router();

  // GET /api/plugins
  router.get('/', requireUser, (_req, res) => {
    res.json({ data: registry.list() });
  });

  // POST /api/plugins/load
  router.post('/load', requireAdmin, async (_req, res) => {
    const results = await registry.loadAllPlugins();
    const outcomes = Object.values(results);
    const totalLoaded = outcomes.filter(Boolean).length;
    res.json({
      data: {
        loadedPlugins: results,
        totalLoaded,
        totalFailed: outcomes.length - totalLoaded,
      },
    });
  });

  // POST /api/plugins/install
  router.post('/install', requireAdmin, validate({ body: installBody }), async (req, res) => {
    const body: InstallBody = req.body;
    const request = {
      name: body.name,
      filename: body.filename,
      autoEnable: body.autoEnable,
      config: body.config,
    };
    const result =
      body.url !== undefined
        ? await installer.installFromUrl(body.url, request)
        : await installer.installFromBytes(Buffer.from(body.content ?? '', 'base64'), request);

    if (!result.ok) {
      sendFailure(res, 400, 'InstallFailed', result.error);
      return;
    }
    res.status(201).json({ data: result.value });
  });

  // POST /api/plugins/upload?filename=&autoEnable=
  router.post(
    '/upload',
    requireAdmin,
    express.raw({ type: () => true, limit: runtime.config.maxPluginSizeBytes }),
    async (req, res) => {
      const query = uploadQuery.safeParse(req.query);
      if (!query.success) {
        sendValidationError(res, query.error);
        return;
      }
      const bytes: unknown = req.body;
      const result = await installer.installFromBytes(
        Buffer.isBuffer(bytes) ? bytes : new Uint8Array(0),
        {
          name: query.data.name,
          filename: query.data.filename,
          autoEnable: query.data.autoEnable,
        },
      );

      if (!result.ok) {
        sendFailure(res, 400, 'InstallFailed', result.error);
        return;
      }
      res.status(201).json({ data: result.value });
    },
  );

  // GET /api/plugins/hooks
  router.get('/hooks', requireUser, (_req, res) => {
    res.json({ data: hooks.listBindings() });
  });

  // POST /api/plugins/hooks/register
  router.post(
    '/hooks/register',
    requireAdmin,
    validate({ body: hookRegisterBody }),
    (req, res) => {
      const { hookName, pluginName, callbackAction }: HookRegisterBody = req.body;
      const result = hooks.register(hookName, pluginName, callbackAction);
      if (!result.ok) {
        sendFailure(res, 400, 'RegistrationFailed', result.error);
        return;
      }
      res.json({
        data: {
          message: `Hook ${hookName} registered for plugin ${pluginName}`,
          binding: result.value,
        },
      });
    },
  );

  // POST /api/plugins/hooks/:hookName/trigger
  router.post(
    '/hooks/:hookName/trigger',
    requireAdmin,
    validate({ params: hookNameParams, body: hookTriggerBody }),
    async (req, res) => {
      const { parameters }: HookTriggerBody = req.body;
      const result = await hooks.trigger(req.params.hookName, parameters);
      if (!result.ok) {
        res.status(404).json({ error: result.error.message, code: result.error.code });
        return;
      }
      res.json({ data: result.value });
    },
  );

  // GET /api/plugins/:name
  router.get('/:name', requireUser, validate({ params: pluginNameParams }), (req, res) => {
    const info = registry.getInfo(req.params.name);
    if (!info.ok) {
      res.status(404).json({ error: info.error.message, code: info.error.code });
      return;
    }
    res.json({ data: info.value });
  });

  // GET /api/plugins/:name/status
  router.get(
    '/:name/status',
    requireUser,
    validate({ params: pluginNameParams }),
    (req, res) => {
      const status = registry.getStatus(req.params.name);
      if (!status.ok) {
        res.status(404).json({ error: status.error.message, code: status.error.code });
        return;
      }
      res.json({ data: status.value });
    },
  );

  // POST /api/plugins/:name/enable
  router.post(
    '/:name/enable',
    requireAdmin,
    validate({ params: pluginNameParams }),
    async (req, res) => {
      const { name } = req.params;
      const result = await registry.enable(name);
      if (!result.ok) {
        sendFailure(res, 400, 'OperationFailed', result.error);
        return;
      }
      res.json({ data: { message: `Plugin ${name} enabled`, status: result.value } });
    },
  );

  // POST /api/plugins/:name/disable
  router.post(
    '/:name/disable',
    requireAdmin,
    validate({ params: pluginNameParams }),
    async (req, res) => {
      const { name } = req.params;
      const result = await registry.disable(name);
      if (!result.ok) {
        sendFailure(res, 400, 'OperationFailed', result.error);
        return;
      }
      res.json({ data: { message: `Plugin ${name} disabled`, status: result.value } });
    },
  );

  // DELETE /api/plugins/:name
  router.delete(
    '/:name',
    requireAdmin,
    validate({ params: pluginNameParams }),
    async (req, res) => {
      const { name } = req.params;
      const result = await registry.unload(name);
      if (!result.ok) {
        sendFailure(res, 400, 'OperationFailed', result.error);
        return;
      }
      res.json({ data: { message: `Plugin ${name} unloaded` } });
    },
  );

  // PUT /api/plugins/:name/config
  router.put(
    '/:name/config',
    requireAdmin,
    validate({ params: pluginNameParams, body: configUpdateBody }),
    async (req, res) => {
      const { name } = req.params;
      const { config }: ConfigUpdateBody = req.body;
      const result = await registry.updateConfig(name, config);
      if (!result.ok) {
        sendFailure(res, 400, 'OperationFailed', result.error);
        return;
      }
      res.json({
        data: { message: `Configuration updated for plugin ${name}`, mode: result.value },
      });
    },
  );

  // POST /api/plugins/:name/execute
  router.post(
    '/:name/execute',
    requireUser,
    validate({ params: pluginNameParams, body: executeBody }),
    async (req, res) => {
      const { action, parameters }: ExecuteBody = req.body;
      const result = await dispatcher.execute(req.params.name, action, parameters);
      res.json({ data: result });
    },
  );

  return router;
}
