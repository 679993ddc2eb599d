/**
 * ConfigStore
 *
 * Durable `plugin name → enabled` map: the record of which plugins *should*
 * run. Every write, including the read half of a read-modify-write, goes
 * through one single-writer queue so updates to different names are never
 * lost.
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
  err,
  errorMessage,
  logger,
  ok,
  PluginRuntimeError,
  type Result,
} from '@plugin-runtime/core';
import { ConcurrencyLimiter } from './concurrency-limiter.js';

const enabledMapSchema = z.record(z.string(), z.boolean());

export type PluginEnabledMap = Record<string, boolean>;

export interface ConfigSnapshot {
  entries: PluginEnabledMap;
  /** Set when the file was missing or malformed; entries is then empty */
  error: PluginRuntimeError | null;
}

let tmpCounter = 0;

export class ConfigStore {
  private readonly writer = new ConcurrencyLimiter(1);

  constructor(readonly filePath: string) {}

  /**
   * Read the persisted map. Never throws: a missing or corrupt file yields an
   * empty map and a ConfigUnavailable error value.
   */
  async load(): Promise<ConfigSnapshot> {
    const snapshot = await this.read();
    if (snapshot.error) {
      logger.warn(
        { configPath: this.filePath, reason: snapshot.error.message },
        'Plugin config unavailable, assuming no plugins are enabled',
      );
    }
    return snapshot;
  }

  /** Replace the whole map. */
  save(entries: PluginEnabledMap): Promise<Result<PluginEnabledMap, PluginRuntimeError>> {
    return this.writer.run(() => this.write({ ...entries }));
  }

  set(name: string, enabled: boolean): Promise<Result<PluginEnabledMap, PluginRuntimeError>> {
    return this.writer.run(async () => {
      const { entries } = await this.read();
      entries[name] = enabled;
      return this.write(entries);
    });
  }

  remove(name: string): Promise<Result<PluginEnabledMap, PluginRuntimeError>> {
    return this.writer.run(async () => {
      const { entries } = await this.read();
      delete entries[name];
      return this.write(entries);
    });
  }

  private async read(): Promise<ConfigSnapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (cause) {
      return this.unavailable(`Plugin config not found at ${this.filePath}`, cause);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (cause) {
      return this.unavailable(`Invalid JSON in ${this.filePath}`, cause);
    }

    const result = enabledMapSchema.safeParse(parsed);
    if (!result.success) {
      return this.unavailable(
        `${this.filePath} must map plugin names to booleans`,
        result.error,
      );
    }
    return { entries: result.data, error: null };
  }

  private async write(
    entries: PluginEnabledMap,
  ): Promise<Result<PluginEnabledMap, PluginRuntimeError>> {
    // Write-then-rename so readers never observe a half-written file
    const tmpPath = `${this.filePath}.${process.pid}.${++tmpCounter}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(entries, null, 2));
      await fs.rename(tmpPath, this.filePath);
      return ok(entries);
    } catch (cause) {
      await fs.rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        logger.debug({ tmpPath, err: rmErr }, 'Failed to remove temp config file');
      });
      logger.error(
        { configPath: this.filePath, err: cause },
        'Failed to write plugin config',
      );
      return err(
        new PluginRuntimeError(
          'ConfigUnavailable',
          `Failed to write ${this.filePath}: ${errorMessage(cause)}`,
          { cause },
        ),
      );
    }
  }

  private unavailable(message: string, cause: unknown): ConfigSnapshot {
    return {
      entries: {},
      error: new PluginRuntimeError('ConfigUnavailable', message, { cause }),
    };
  }
}
