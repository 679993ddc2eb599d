import { z } from 'zod';
import { PLUGIN_NAME_RE, RESERVED_PLUGIN_NAMES } from '../../app/src/plugin-discovery.js';

/** Plugin name: alphanumeric, underscore, hyphen only (path traversal protection) */
export const pluginNameParam = z
  .string()
  .regex(PLUGIN_NAME_RE, 'Invalid plugin name')
  .max(100, 'Invalid plugin name')
  .refine((name) => !RESERVED_PLUGIN_NAMES.has(name), 'Invalid plugin name');

/** Hook or action identifier as accepted by the plugin host API */
export const identifierParam = z
  .string()
  .regex(/^[A-Za-z0-9_.:-]+$/, 'Invalid identifier');

/** Query-string boolean: "true"/"1" → true, "false"/"0" → false, absent → default */
export function booleanQuery(defaultValue: boolean) {
  return z
    .enum(['true', 'false', '1', '0'], { message: 'Must be true or false' })
    .optional()
    .transform((val) => (val === undefined ? defaultValue : val === 'true' || val === '1'));
}

/** Free-form JSON object (plugin parameters and configuration) */
export const jsonObject = z.record(z.string(), z.unknown());
