import { z } from 'zod';
import { booleanQuery, identifierParam, jsonObject, pluginNameParam } from './shared.js';

/** Route params for endpoints with :name */
export const pluginNameParams = z.object({
  name: pluginNameParam,
});

/** Route params for POST /api/plugins/hooks/:hookName/trigger */
export const hookNameParams = z.object({
  hookName: identifierParam,
});

/** POST /api/plugins/install body: exactly one of url / content (base64) */
export const installBody = z
  .object({
    url: z.url({ message: 'Invalid plugin URL' }).optional(),
    content: z.base64({ message: 'content must be base64' }).optional(),
    name: pluginNameParam.optional(),
    filename: z.string().min(1).max(255).optional(),
    autoEnable: z.boolean().optional(),
    config: jsonObject.optional(),
  })
  .refine((body) => (body.url === undefined) !== (body.content === undefined), {
    message: 'Provide either url or content',
  });

/** POST /api/plugins/upload query */
export const uploadQuery = z.object({
  filename: z.string().min(1).max(255).optional(),
  name: pluginNameParam.optional(),
  autoEnable: booleanQuery(true),
});

/** PUT /api/plugins/:name/config body */
export const configUpdateBody = z.object({
  config: jsonObject,
});

/** POST /api/plugins/hooks/register body */
export const hookRegisterBody = z.object({
  hookName: identifierParam,
  pluginName: pluginNameParam,
  callbackAction: identifierParam,
});

/** POST /api/plugins/hooks/:hookName/trigger body */
export const hookTriggerBody = z
  .object({
    parameters: jsonObject.default({}),
  })
  .default({ parameters: {} });

/** POST /api/plugins/:name/execute body */
export const executeBody = z.object({
  action: identifierParam,
  parameters: jsonObject.default({}),
});

export type InstallBody = z.infer<typeof installBody>;
export type UploadQuery = z.infer<typeof uploadQuery>;
export type ConfigUpdateBody = z.infer<typeof configUpdateBody>;
export type HookRegisterBody = z.infer<typeof hookRegisterBody>;
export type HookTriggerBody = z.infer<typeof hookTriggerBody>;
export type ExecuteBody = z.infer<typeof executeBody>;
