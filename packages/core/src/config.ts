import path from 'path';
import { envSchema, type ParsedEnv } from './config-schema.js';

// ============================================================================
// Config Types
// ============================================================================

export interface PluginRuntimeConfig {
  /** Directory holding one `<name>.js` artifact per plugin */
  pluginsDir: string;
  /** Flat JSON `{ name: enabled }` file */
  configPath: string;
  actionTimeoutMs: number;
  loadTimeoutMs: number;
  drainTimeoutMs: number;
  loadConcurrency: number;
  fetchTimeoutMs: number;
  maxPluginSizeBytes: number;
  server: {
    host: string;
    port: number;
    corsOrigins: string[];
    apiKey?: string;
    adminApiKey?: string;
  };
  logLevel?: ParsedEnv['LOG_LEVEL'];
}

// ============================================================================
// Factory: create config from env (no process.exit; the caller handles validation)
// ============================================================================

export function createConfig(
  overrides: Partial<PluginRuntimeConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): PluginRuntimeConfig {
  const PROJECT_ROOT = process.cwd();

  // Invalid env falls back to schema defaults rather than aborting startup
  const parsed = envSchema.safeParse(env);
  const values: ParsedEnv = parsed.success ? parsed.data : envSchema.parse({});

  const defaults: PluginRuntimeConfig = {
    pluginsDir: path.resolve(PROJECT_ROOT, values.PLUGINS_DIR),
    configPath: path.resolve(PROJECT_ROOT, values.PLUGINS_CONFIG),
    actionTimeoutMs: values.PLUGIN_ACTION_TIMEOUT_MS,
    loadTimeoutMs: values.PLUGIN_LOAD_TIMEOUT_MS,
    drainTimeoutMs: values.PLUGIN_DRAIN_TIMEOUT_MS,
    loadConcurrency: values.PLUGIN_LOAD_CONCURRENCY,
    fetchTimeoutMs: values.PLUGIN_FETCH_TIMEOUT_MS,
    maxPluginSizeBytes: values.PLUGIN_MAX_SIZE_BYTES,
    server: {
      host: values.HOST,
      port: values.PORT,
      corsOrigins: values.CORS_ORIGINS,
      apiKey: values.API_KEY || undefined,
      adminApiKey: values.ADMIN_API_KEY || undefined,
    },
    logLevel: values.LOG_LEVEL,
  };

  return { ...defaults, ...overrides };
}
