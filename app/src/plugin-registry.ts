/**
 * Plugin Registry
 *
 * In-memory table of every known plugin: its descriptor, lifecycle state and
 * (while enabled) its live handle. All lifecycle mutations funnel through
 * here and are serialized per plugin name; reads never wait on a lock.
 *
 *   unregistered --install--> installed-disabled --enable--> enabled
 *   enabled --disable--> installed-disabled
 *   enabled --runtime fault--> errored --disable / enable--> installed-disabled / enabled
 *   any --unload--> unloaded (record removed; the name is free again)
 *
 * `loading` and `disabling` only exist while a mutating call is running.
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
  err,
  errorMessage,
  loadJson,
  logger,
  ok,
  PluginRuntimeError,
  saveJson,
  type Result,
} from '@plugin-runtime/core';
import type { EventBus } from '@plugin-runtime/event-bus';
import { ConcurrencyLimiter } from './concurrency-limiter.js';
import type { ConfigStore } from './config-store.js';
import { NameLockManager } from './name-lock-manager.js';
import {
  artifactPath,
  discoverPluginArtifacts,
  isValidPluginName,
  pluginConfigPath,
} from './plugin-discovery.js';
import type { PluginHandle } from './plugin-handle.js';
import { compilePluginSource, type PluginLoader } from './plugin-loader.js';
import type {
  ConfigUpdateMode,
  InstallOptions,
  InstallOutcome,
  PluginDescriptor,
  PluginInfo,
  PluginListing,
  PluginRuntimeState,
  PluginStatus,
  PluginStatusRecord,
} from './plugin-types.js';

const pluginConfigSchema = z.record(z.string(), z.unknown());

export interface PluginRegistryOptions {
  pluginsDir: string;
  configStore: ConfigStore;
  loader: PluginLoader;
  events: EventBus;
  /** Grace period for in-flight calls when a handle is retired */
  drainTimeoutMs: number;
  /** Parallel loads during loadAllPlugins() */
  loadConcurrency: number;
  locks?: NameLockManager;
  clock?: () => number;
}

/** A claim on a live handle for the duration of one call. */
export interface ActionLease {
  handle: PluginHandle;
  release(): void;
}

interface PluginRecord {
  descriptor: PluginDescriptor;
  state: PluginRuntimeState;
  handle: PluginHandle | null;
}

type RetiredStatus = Extract<PluginStatus, 'installed-disabled' | 'errored' | 'unloaded'>;

let tmpCounter = 0;

async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.${++tmpCounter}.tmp`;
  try {
    await fs.writeFile(tmpPath, contents);
    await fs.rename(tmpPath, filePath);
  } finally {
    await fs.rm(tmpPath, { force: true });
  }
}

function notFound(name: string): PluginRuntimeError {
  return new PluginRuntimeError('NotFound', `Plugin ${name} not found`, {
    pluginName: name,
  });
}

export class PluginRegistry {
  readonly pluginsDir: string;
  private readonly records = new Map<string, PluginRecord>();
  private readonly configStore: ConfigStore;
  private readonly loader: PluginLoader;
  private readonly events: EventBus;
  private readonly locks: NameLockManager;
  private readonly loadLimiter: ConcurrencyLimiter;
  private readonly drainTimeoutMs: number;
  private readonly clock: () => number;
  private initialized = false;

  constructor(options: PluginRegistryOptions) {
    this.pluginsDir = path.resolve(options.pluginsDir);
    this.configStore = options.configStore;
    this.loader = options.loader;
    this.events = options.events;
    this.locks = options.locks ?? new NameLockManager();
    this.loadLimiter = new ConcurrencyLimiter(options.loadConcurrency);
    this.drainTimeoutMs = options.drainTimeoutMs;
    this.clock = options.clock ?? Date.now;
  }

  /** Prepare the plugins directory. Must run before any other call. */
  async init(): Promise<void> {
    await fs.mkdir(this.pluginsDir, { recursive: true });
    this.initialized = true;
  }

  // ==========================================================================
  // Discovery & bulk load
  // ==========================================================================

  /**
   * Register every artifact in the plugins directory that is not known yet.
   * Names with a lifecycle call in flight are left to that call. Returns the
   * newly registered names.
   */
  discover(): string[] {
    this.assertInitialized();
    const added: string[] = [];
    for (const artifact of discoverPluginArtifacts(this.pluginsDir)) {
      if (this.records.has(artifact.name) || this.locks.isBusy(artifact.name)) continue;
      const config = loadJson(
        pluginConfigPath(this.pluginsDir, artifact.name),
        pluginConfigSchema,
        {},
      );
      this.records.set(
        artifact.name,
        this.createRecord(artifact.name, artifact.filePath, config),
      );
      added.push(artifact.name);
    }
    if (added.length > 0) {
      logger.debug({ plugins: added }, 'Discovered plugin artifacts');
    }
    return added;
  }

  /**
   * Enable every plugin the persisted config marks as enabled. One plugin's
   * failure never affects the others.
   */
  async loadAllPlugins(): Promise<Record<string, boolean>> {
    this.assertInitialized();
    const { entries } = await this.configStore.load();
    this.discover();

    const wanted = Object.entries(entries)
      .filter(([, enabled]) => enabled)
      .map(([name]) => name);

    const outcomes = await this.loadLimiter.map(wanted, (name) =>
      this.locks.withLock(name, async (): Promise<[string, boolean]> => {
        const record = this.records.get(name);
        if (!record) {
          logger.warn({ plugin: name }, 'Plugin enabled in config but no artifact found');
          return [name, false];
        }
        if (record.state.status === 'enabled') return [name, true];
        const loaded = await this.activate(record);
        return [name, loaded.ok];
      }),
    );

    const results = Object.fromEntries(outcomes);
    const loadedCount = outcomes.filter(([, success]) => success).length;
    logger.info(
      { loaded: loadedCount, failed: outcomes.length - loadedCount },
      'Configured plugins loaded',
    );
    return results;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async enable(name: string): Promise<Result<PluginStatusRecord, PluginRuntimeError>> {
    this.assertInitialized();
    return this.locks.withLock(name, async () => {
      const record = this.records.get(name);
      if (!record) return err(notFound(name));
      if (record.state.status === 'enabled') return ok(this.statusOf(record));

      // Intent is persisted even if the load below fails
      await this.persistEnabled(name, true);
      const loaded = await this.activate(record);
      return loaded.ok ? ok(this.statusOf(record)) : err(loaded.error);
    });
  }

  async disable(name: string): Promise<Result<PluginStatusRecord, PluginRuntimeError>> {
    this.assertInitialized();
    return this.locks.withLock(name, async () => {
      const record = this.records.get(name);
      if (!record) return err(notFound(name));

      const wasLive = record.handle !== null;
      // The handle is detached synchronously; draining overlaps the config write
      await Promise.all([
        this.deactivate(record, 'installed-disabled'),
        this.persistEnabled(name, false),
      ]);
      if (wasLive) {
        logger.info({ plugin: name }, 'Plugin disabled');
      }
      this.events.emit('plugin:disabled', { name });
      return ok(this.statusOf(record));
    });
  }

  /**
   * Retire the plugin and forget it entirely: record, persisted flag,
   * artifact and config file. It must be installed again to come back.
   */
  async unload(name: string): Promise<Result<PluginStatusRecord, PluginRuntimeError>> {
    this.assertInitialized();
    return this.locks.withLock(name, async () => {
      const record = this.records.get(name);
      if (!record) return err(notFound(name));

      await this.deactivate(record, 'unloaded');
      this.records.delete(name);
      record.state.loadedAt = null;

      const removed = await this.configStore.remove(name);
      if (!removed.ok) {
        logger.warn({ plugin: name, reason: removed.error.message }, 'Could not remove plugin from config');
      }
      await this.removeFiles(name, record.descriptor.filePath);

      logger.info({ plugin: name }, 'Plugin unloaded');
      this.events.emit('plugin:unloaded', { name, reason: 'unloaded' });
      return ok(this.statusOf(record));
    });
  }

  /**
   * Store `source` as the plugin's artifact and register a fresh descriptor.
   * A previous instance under the same name is fully retired first.
   */
  async install(
    name: string,
    source: string,
    options: InstallOptions = {},
  ): Promise<Result<InstallOutcome, PluginRuntimeError>> {
    this.assertInitialized();
    if (!isValidPluginName(name)) {
      return err(
        new PluginRuntimeError(
          'InvalidName',
          `Invalid plugin name: ${JSON.stringify(name)}`,
          { pluginName: name },
        ),
      );
    }

    const filePath = artifactPath(this.pluginsDir, name);
    const compiled = compilePluginSource(source, filePath);
    if (!compiled.ok) {
      return err(
        new PluginRuntimeError('InvalidSource', compiled.error.message, {
          pluginName: name,
          cause: compiled.error.cause,
        }),
      );
    }

    const autoEnable = options.autoEnable ?? true;
    const config = options.config ?? {};

    return this.locks.withLock(name, async () => {
      const previous = this.records.get(name);
      if (previous) {
        await this.deactivate(previous, 'unloaded');
        this.records.delete(name);
        this.events.emit('plugin:unloaded', { name, reason: 'replaced' });
      }

      const configFile = pluginConfigPath(this.pluginsDir, name);
      try {
        await writeFileAtomic(filePath, source);
        if (options.config) {
          saveJson(configFile, config);
        } else {
          await fs.rm(configFile, { force: true });
        }
      } catch (cause) {
        logger.error({ plugin: name, err: cause }, 'Failed to store plugin artifact');
        return err(
          new PluginRuntimeError(
            'StorageFailure',
            `Failed to store plugin ${name}: ${errorMessage(cause)}`,
            { pluginName: name, cause },
          ),
        );
      }

      await this.persistEnabled(name, autoEnable);
      const record = this.createRecord(name, filePath, config);
      this.records.set(name, record);
      logger.info({ plugin: name, replaced: Boolean(previous), autoEnable }, 'Plugin installed');
      this.events.emit('plugin:installed', { name, filePath, autoEnable });

      if (autoEnable) {
        await this.activate(record);
      }

      return ok({
        descriptor: this.copyDescriptor(record.descriptor),
        status: this.statusOf(record),
        installedAt: new Date(this.clock()).toISOString(),
      });
    });
  }

  /**
   * Merge `config` into the plugin's configuration and persist it. A live
   * plugin gets the new values through its configure listeners when it has
   * any, otherwise it is reloaded.
   */
  async updateConfig(
    name: string,
    config: Record<string, unknown>,
  ): Promise<Result<ConfigUpdateMode, PluginRuntimeError>> {
    this.assertInitialized();
    return this.locks.withLock(name, async () => {
      const record = this.records.get(name);
      if (!record) return err(notFound(name));

      const merged = { ...record.descriptor.config, ...config };
      try {
        saveJson(pluginConfigPath(this.pluginsDir, name), merged);
      } catch (cause) {
        return err(
          new PluginRuntimeError(
            'StorageFailure',
            `Failed to store configuration for ${name}: ${errorMessage(cause)}`,
            { pluginName: name, cause },
          ),
        );
      }
      record.descriptor.config = merged;

      let mode: ConfigUpdateMode = 'stored';
      const handle = record.handle;
      if (record.state.status === 'enabled' && handle) {
        if (handle.supportsLiveConfig) {
          try {
            await handle.reconfigure(merged);
            mode = 'live';
          } catch (cause) {
            const message = `Plugin ${name} rejected configuration: ${errorMessage(cause)}`;
            await this.fault(record, message);
            return err(
              new PluginRuntimeError('ExecutionFailure', message, { pluginName: name, cause }),
            );
          }
        } else {
          await this.deactivate(record, 'installed-disabled');
          const reloaded = await this.activate(record);
          if (!reloaded.ok) return err(reloaded.error);
          mode = 'reloaded';
        }
      }

      logger.info({ plugin: name, mode }, 'Plugin configuration updated');
      this.events.emit('plugin:config-updated', { name, mode });
      return ok(mode);
    });
  }

  // ==========================================================================
  // Invocation support
  // ==========================================================================

  /**
   * Claim the live handle for one call. New claims fail as soon as a
   * disable/unload has started.
   */
  acquire(name: string): Result<ActionLease, PluginRuntimeError> {
    this.assertInitialized();
    const record = this.records.get(name);
    if (!record) return err(notFound(name));

    const handle = record.handle;
    if (record.state.status !== 'enabled' || !handle || !handle.begin()) {
      return err(
        new PluginRuntimeError('NotEnabled', `Plugin ${name} is not enabled`, {
          pluginName: name,
        }),
      );
    }

    let released = false;
    return ok({
      handle,
      release: () => {
        if (released) return;
        released = true;
        handle.end();
      },
    });
  }

  /** Remember a per-call failure without changing the plugin's status. */
  recordError(name: string, message: string): void {
    const record = this.records.get(name);
    if (record) record.state.lastError = message;
  }

  /**
   * A failure observed after the caller stopped waiting. Moves the plugin to
   * `errored` if `handle` is still the live one.
   */
  async reportFault(name: string, handle: PluginHandle, message: string): Promise<void> {
    await this.locks.withLock(name, async () => {
      const record = this.records.get(name);
      if (!record || record.handle !== handle) return;
      logger.warn({ plugin: name, reason: message }, 'Late plugin failure, marking plugin errored');
      await this.fault(record, message);
    });
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  has(name: string): boolean {
    return this.records.has(name);
  }

  /** Current lifecycle status; `unregistered` for unknown names. */
  lifecycleStatus(name: string): PluginStatus {
    return this.records.get(name)?.state.status ?? 'unregistered';
  }

  list(): PluginListing {
    const plugins = [...this.records.values()]
      .sort((a, b) => a.descriptor.name.localeCompare(b.descriptor.name))
      .map((record) => ({
        name: record.descriptor.name,
        version: record.descriptor.version,
        status: record.state.status,
        enabled: record.state.status === 'enabled',
        lastError: record.state.lastError,
      }));
    const enabledCount = plugins.filter((p) => p.enabled).length;
    return {
      plugins,
      totalCount: plugins.length,
      enabledCount,
      disabledCount: plugins.length - enabledCount,
      erroredCount: plugins.filter((p) => p.status === 'errored').length,
    };
  }

  getInfo(name: string): Result<PluginInfo, PluginRuntimeError> {
    const record = this.records.get(name);
    if (!record) return err(notFound(name));
    return ok({ ...this.copyDescriptor(record.descriptor), ...this.statusOf(record) });
  }

  getStatus(name: string): Result<PluginStatusRecord, PluginRuntimeError> {
    const record = this.records.get(name);
    if (!record) return err(notFound(name));
    return ok(this.statusOf(record));
  }

  /** Retire every live handle, e.g. on process shutdown. Config is untouched. */
  async shutdown(): Promise<void> {
    await Promise.all(
      [...this.records.keys()].map((name) =>
        this.locks.withLock(name, async () => {
          const record = this.records.get(name);
          if (record?.handle) await this.deactivate(record, 'installed-disabled');
        }),
      ),
    );
  }

  // ==========================================================================
  // Internals (callers hold the name lock)
  // ==========================================================================

  private async activate(
    record: PluginRecord,
  ): Promise<Result<PluginHandle, PluginRuntimeError>> {
    const { name } = record.descriptor;
    record.state.status = 'loading';
    let settled = false;
    try {
      const loaded = await this.loader.load(
        name,
        record.descriptor.filePath,
        record.descriptor.config,
        (handle, message) => {
          this.reportFault(name, handle, message).catch((cause: unknown) => {
            logger.error({ plugin: name, err: cause }, 'Failed to record plugin fault');
          });
        },
      );
      settled = true;
      if (!loaded.ok) {
        this.markErrored(record, loaded.error.message);
        return loaded;
      }

      const handle = loaded.value;
      const now = this.clock();
      record.handle = handle;
      record.descriptor.version = handle.version;
      record.descriptor.description = handle.description;
      record.descriptor.author = handle.author;
      record.descriptor.configSchema = handle.configSchema;
      record.descriptor.availableActions = handle.actionNames;
      record.state = {
        status: 'enabled',
        loadedAt: new Date(now).toISOString(),
        lastError: null,
        enabledSince: now,
      };

      this.events.emit('plugin:enabled', {
        name,
        version: handle.version,
        actions: handle.actionNames,
        hooks: handle.hooks.map((h) => ({ hookName: h.hookName, action: h.action })),
      });
      return ok(handle);
    } finally {
      // Never leave a transient status behind if the load threw
      if (!settled) {
        this.markErrored(record, `Loading plugin ${name} was interrupted`);
      }
    }
  }

  private async deactivate(record: PluginRecord, finalStatus: RetiredStatus): Promise<void> {
    const handle = record.handle;
    record.handle = null;
    record.state.enabledSince = null;
    if (!handle) {
      record.state.status = finalStatus;
      return;
    }
    record.state.status = 'disabling';
    try {
      await handle.retire(this.drainTimeoutMs);
    } finally {
      record.state.status = finalStatus;
    }
  }

  private async fault(record: PluginRecord, message: string): Promise<void> {
    await this.deactivate(record, 'errored');
    this.markErrored(record, message);
  }

  private markErrored(record: PluginRecord, message: string): void {
    record.state.status = 'errored';
    record.state.lastError = message;
    record.state.enabledSince = null;
    this.events.emit('plugin:errored', { name: record.descriptor.name, error: message });
  }

  private async persistEnabled(name: string, enabled: boolean): Promise<void> {
    const result = await this.configStore.set(name, enabled);
    if (!result.ok) {
      logger.warn({ plugin: name, enabled, reason: result.error.message }, 'Plugin config not persisted');
    }
  }

  private async removeFiles(name: string, filePath: string): Promise<void> {
    for (const file of [filePath, pluginConfigPath(this.pluginsDir, name)]) {
      try {
        await fs.rm(file, { force: true });
      } catch (cause) {
        logger.warn({ plugin: name, file, err: cause }, 'Failed to remove plugin file');
      }
    }
  }

  private createRecord(
    name: string,
    filePath: string,
    config: Record<string, unknown>,
  ): PluginRecord {
    return {
      descriptor: {
        name,
        version: '0.0.0',
        description: '',
        author: '',
        filePath,
        config: { ...config },
        configSchema: {},
        availableActions: [],
      },
      state: {
        status: 'installed-disabled',
        loadedAt: null,
        lastError: null,
        enabledSince: null,
      },
      handle: null,
    };
  }

  private statusOf(record: PluginRecord): PluginStatusRecord {
    const { status, lastError, loadedAt, enabledSince } = record.state;
    return {
      name: record.descriptor.name,
      status,
      enabled: status === 'enabled',
      lastError,
      loadedAt,
      uptime:
        status === 'enabled' && enabledSince !== null
          ? Math.max(0, (this.clock() - enabledSince) / 1000)
          : null,
    };
  }

  private copyDescriptor(descriptor: PluginDescriptor): PluginDescriptor {
    return {
      ...descriptor,
      config: { ...descriptor.config },
      configSchema: { ...descriptor.configSchema },
      availableActions: [...descriptor.availableActions],
    };
  }

  private assertInitialized(): void {
    if (!this.initialized) {
      throw new Error('PluginRegistry used before init()');
    }
  }
}
