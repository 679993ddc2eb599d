import { describe, it, expect } from 'vitest';
import path from 'path';
import { envSchema } from '../config-schema.js';
import { createConfig } from '../config.js';

describe('envSchema', () => {
  describe('defaults', () => {
    it('succeeds with an empty environment', () => {
      const result = envSchema.safeParse({});
      expect(result.success).toBe(true);
    });

    it('provides default plugin locations', () => {
      const result = envSchema.safeParse({});
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.PLUGINS_DIR).toBe('plugins');
        expect(result.data.PLUGINS_CONFIG).toBe('plugins/config.json');
      }
    });

    it('provides default timeouts as numbers', () => {
      const result = envSchema.safeParse({});
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.PLUGIN_ACTION_TIMEOUT_MS).toBe(30000);
        expect(result.data.PLUGIN_DRAIN_TIMEOUT_MS).toBe(5000);
        expect(result.data.PLUGIN_FETCH_TIMEOUT_MS).toBe(15000);
      }
    });

    it('provides default CORS_ORIGINS as a list', () => {
      const result = envSchema.safeParse({});
      if (result.success) {
        expect(result.data.CORS_ORIGINS).toEqual(['http://localhost:5173']);
      }
    });
  });

  describe('coercion', () => {
    it('parses integer strings', () => {
      const result = envSchema.safeParse({ PLUGIN_ACTION_TIMEOUT_MS: '2500' });
      if (result.success) expect(result.data.PLUGIN_ACTION_TIMEOUT_MS).toBe(2500);
    });

    it('falls back to the default for non-numeric or non-positive values', () => {
      const result = envSchema.safeParse({
        PLUGIN_LOAD_CONCURRENCY: 'many',
        PLUGIN_MAX_SIZE_BYTES: '0',
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.PLUGIN_LOAD_CONCURRENCY).toBe(4);
        expect(result.data.PLUGIN_MAX_SIZE_BYTES).toBe(1048576);
      }
    });

    it('splits and trims CORS_ORIGINS', () => {
      const result = envSchema.safeParse({
        CORS_ORIGINS: 'http://a.test, http://b.test ,',
      });
      if (result.success) {
        expect(result.data.CORS_ORIGINS).toEqual(['http://a.test', 'http://b.test']);
      }
    });

    it('drops an unknown LOG_LEVEL instead of failing', () => {
      const result = envSchema.safeParse({ LOG_LEVEL: 'verbose' });
      expect(result.success).toBe(true);
      if (result.success) expect(result.data.LOG_LEVEL).toBeUndefined();
    });

    it('keeps a known LOG_LEVEL', () => {
      const result = envSchema.safeParse({ LOG_LEVEL: 'debug' });
      if (result.success) expect(result.data.LOG_LEVEL).toBe('debug');
    });
  });
});

describe('createConfig', () => {
  it('resolves plugin paths against the working directory', () => {
    const config = createConfig({}, {});
    expect(config.pluginsDir).toBe(path.resolve(process.cwd(), 'plugins'));
    expect(config.configPath).toBe(
      path.resolve(process.cwd(), 'plugins/config.json'),
    );
  });

  it('reads values from the given environment', () => {
    const config = createConfig(
      {},
      { PLUGIN_ACTION_TIMEOUT_MS: '100', PORT: '9001', ADMIN_API_KEY: 'test-admin' },
    );
    expect(config.actionTimeoutMs).toBe(100);
    expect(config.server.port).toBe(9001);
    expect(config.server.adminApiKey).toBe('test-admin');
    expect(config.server.apiKey).toBeUndefined();
  });

  it('applies overrides last', () => {
    const config = createConfig({ pluginsDir: '/tmp/custom-plugins' }, {});
    expect(config.pluginsDir).toBe('/tmp/custom-plugins');
  });
});
