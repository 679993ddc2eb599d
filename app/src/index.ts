/**
 * Plugin Runtime Entry Point
 *
 * Loads configuration, enables the configured plugins and serves the
 * plugin management API until SIGINT/SIGTERM.
 */
import 'dotenv/config';

import { createConfig, logger, setLogLevel } from '@plugin-runtime/core';
import { createPluginServer } from '../../src/server.js';
import { createPluginRuntime } from './runtime.js';

async function main(): Promise<void> {
  const config = createConfig();
  if (config.logLevel) setLogLevel(config.logLevel);

  logger.info(
    { pluginsDir: config.pluginsDir, configPath: config.configPath },
    'Starting plugin runtime',
  );

  const runtime = createPluginRuntime(config);
  const loaded = await runtime.start();
  const failed = Object.entries(loaded)
    .filter(([, success]) => !success)
    .map(([name]) => name);
  if (failed.length > 0) {
    logger.warn({ plugins: failed }, 'Some configured plugins failed to load');
  }

  const server = createPluginServer({ runtime });
  await server.start();

  let shuttingDown = false;
  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down gracefully');
    try {
      await server.stop();
      await runtime.stop();
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exitCode = 1;
    }
    process.exit();
  }

  process.on('SIGINT', () => {
    gracefulShutdown('SIGINT').catch((err: unknown) => logger.error({ err }, 'Shutdown failed'));
  });
  process.on('SIGTERM', () => {
    gracefulShutdown('SIGTERM').catch((err: unknown) => logger.error({ err }, 'Shutdown failed'));
  });
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Fatal error');
  process.exit(1);
});
