import { z } from 'zod';

// ============================================================================
// Transform helpers
// ============================================================================

/**
 * Parse an env string as a positive integer, falling back to defaultValue.
 */
function envInt(defaultValue: number) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultValue;
      const parsed = parseInt(val, 10);
      return Number.isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
    });
}

/**
 * Parse a comma-separated env string into a trimmed, non-empty list.
 */
function envList(defaultValue: string) {
  return z
    .string()
    .optional()
    .transform((val) =>
      (val || defaultValue)
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean),
    );
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

// ============================================================================
// Environment schema
// ============================================================================

export const envSchema = z.object({
  // Plugin storage
  PLUGINS_DIR: z.string().optional().default('plugins'),
  PLUGINS_CONFIG: z.string().optional().default('plugins/config.json'),

  // Plugin execution
  PLUGIN_ACTION_TIMEOUT_MS: envInt(30000),
  PLUGIN_LOAD_TIMEOUT_MS: envInt(10000),
  PLUGIN_DRAIN_TIMEOUT_MS: envInt(5000),
  PLUGIN_LOAD_CONCURRENCY: envInt(4),

  // Installation
  PLUGIN_FETCH_TIMEOUT_MS: envInt(15000),
  PLUGIN_MAX_SIZE_BYTES: envInt(1048576),

  // HTTP
  PORT: envInt(8000),
  HOST: z.string().optional().default('127.0.0.1'),
  API_KEY: z.string().optional(),
  ADMIN_API_KEY: z.string().optional(),
  CORS_ORIGINS: envList('http://localhost:5173'),

  // Logging
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((val) => LOG_LEVELS.find((level) => level === val)),
  NODE_ENV: z.string().optional(),
});

export type ParsedEnv = z.infer<typeof envSchema>;
