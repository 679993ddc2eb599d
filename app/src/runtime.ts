/**
 * Plugin runtime composition root.
 *
 * Builds every runtime component from a PluginRuntimeConfig and wires them
 * to one EventBus. Callers (the HTTP server, tests) only ever see the
 * PluginRuntime object returned here.
 */

import { logger, type PluginRuntimeConfig } from '@plugin-runtime/core';
import { EventBus, type RuntimeEventName } from '@plugin-runtime/event-bus';
import { ActionDispatcher } from './action-dispatcher.js';
import { ConfigStore } from './config-store.js';
import { HookBus } from './hook-bus.js';
import { InstallManager } from './install-manager.js';
import { NameLockManager } from './name-lock-manager.js';
import { PluginLoader } from './plugin-loader.js';
import { PluginRegistry } from './plugin-registry.js';

export interface PluginRuntime {
  readonly config: PluginRuntimeConfig;
  readonly events: EventBus;
  readonly configStore: ConfigStore;
  readonly registry: PluginRegistry;
  readonly dispatcher: ActionDispatcher;
  readonly hooks: HookBus;
  readonly installer: InstallManager;
  /** Prepare directories and enable every plugin the config marks enabled */
  start(): Promise<Record<string, boolean>>;
  /** Retire all live plugins; persisted enablement is left alone */
  stop(): Promise<void>;
}

const AUDITED_EVENTS: RuntimeEventName[] = [
  'plugin:installed',
  'plugin:enabled',
  'plugin:disabled',
  'plugin:errored',
  'plugin:unloaded',
  'plugin:config-updated',
  'hook:registered',
];

export function createPluginRuntime(config: PluginRuntimeConfig): PluginRuntime {
  const events = new EventBus();
  const configStore = new ConfigStore(config.configPath);
  const loader = new PluginLoader({ loadTimeoutMs: config.loadTimeoutMs });
  const registry = new PluginRegistry({
    pluginsDir: config.pluginsDir,
    configStore,
    loader,
    events,
    locks: new NameLockManager(),
    drainTimeoutMs: config.drainTimeoutMs,
    loadConcurrency: config.loadConcurrency,
  });
  const dispatcher = new ActionDispatcher({
    registry,
    events,
    actionTimeoutMs: config.actionTimeoutMs,
  });
  const hooks = new HookBus({ registry, dispatcher, events });
  const installer = new InstallManager({
    registry,
    maxPluginSizeBytes: config.maxPluginSizeBytes,
    fetchTimeoutMs: config.fetchTimeoutMs,
  });

  // Audit trail of plugin management activity
  for (const event of AUDITED_EVENTS) {
    events.on(event, (payload) => {
      logger.info({ event, ...payload }, 'Plugin audit');
    });
  }

  return {
    config,
    events,
    configStore,
    registry,
    dispatcher,
    hooks,
    installer,

    async start() {
      await registry.init();
      return registry.loadAllPlugins();
    },

    async stop() {
      await registry.shutdown();
      hooks.dispose();
      events.destroy();
      logger.info('Plugin runtime stopped');
    },
  };
}
