/**
 * PluginHandle
 *
 * The live, in-process side of a loaded plugin. Tracks in-flight calls so a
 * retired handle can drain before its dispose listeners run.
 */

import { logger } from '@plugin-runtime/core';
import type {
  ActionContext,
  ActionHandler,
  ConfigureListener,
  DisposeListener,
} from './plugin-types.js';

export interface HookDeclaration {
  hookName: string;
  action: string;
}

export interface PluginHandleInit {
  name: string;
  version: string;
  description: string;
  author: string;
  actions: ReadonlyMap<string, ActionHandler>;
  hooks: readonly HookDeclaration[];
  configSchema: Record<string, unknown>;
  configureListeners: readonly ConfigureListener[];
  disposeListeners: readonly DisposeListener[];
}

export class PluginHandle {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly author: string;
  readonly configSchema: Record<string, unknown>;
  readonly hooks: readonly HookDeclaration[];

  private readonly actions: ReadonlyMap<string, ActionHandler>;
  private readonly configureListeners: readonly ConfigureListener[];
  private readonly disposeListeners: readonly DisposeListener[];

  private inFlight = 0;
  private retired = false;
  private disposed = false;
  private disposalDeferred = false;
  private idleWaiters: Array<() => void> = [];

  constructor(init: PluginHandleInit) {
    this.name = init.name;
    this.version = init.version;
    this.description = init.description;
    this.author = init.author;
    this.configSchema = init.configSchema;
    this.hooks = init.hooks;
    this.actions = init.actions;
    this.configureListeners = init.configureListeners;
    this.disposeListeners = init.disposeListeners;
  }

  get actionNames(): string[] {
    return [...this.actions.keys()];
  }

  hasAction(action: string): boolean {
    return this.actions.has(action);
  }

  get supportsLiveConfig(): boolean {
    return this.configureListeners.length > 0;
  }

  get isRetired(): boolean {
    return this.retired;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get activeCalls(): number {
    return this.inFlight;
  }

  /** Claim a call slot. Fails once the handle is retired. */
  begin(): boolean {
    if (this.retired) return false;
    this.inFlight++;
    return true;
  }

  end(): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
    if (this.inFlight > 0) return;

    for (const wake of this.idleWaiters.splice(0)) wake();
    if (this.disposalDeferred) {
      this.disposalDeferred = false;
      logger.debug({ plugin: this.name }, 'Last in-flight call finished, disposing retired plugin');
      this.dispose().catch((err: unknown) => {
        logger.error({ plugin: this.name, err }, 'Deferred plugin disposal failed');
      });
    }
  }

  /** Run an action handler. Callers hold a slot from begin(). */
  async invoke(
    action: string,
    params: Record<string, unknown>,
    context: ActionContext,
  ): Promise<unknown> {
    const handler = this.actions.get(action);
    if (!handler) {
      throw new Error(`Plugin ${this.name} has no action ${action}`);
    }
    return await handler(params, context);
  }

  /** Deliver new configuration to the plugin's configure listeners, in order. */
  async reconfigure(config: Record<string, unknown>): Promise<void> {
    const frozen = Object.freeze({ ...config });
    for (const listener of this.configureListeners) {
      await listener(frozen);
    }
  }

  /**
   * Refuse new calls, wait up to `graceMs` for in-flight ones, then dispose.
   * If calls are still running when the grace period ends, disposal happens
   * when the last one finishes. Resolves true when the handle drained in time.
   */
  async retire(graceMs: number): Promise<boolean> {
    this.retired = true;
    const drained = await this.waitForIdle(graceMs);
    if (drained) {
      await this.dispose();
    } else {
      this.disposalDeferred = true;
      logger.warn(
        { plugin: this.name, activeCalls: this.inFlight, graceMs },
        'Plugin still has in-flight calls, deferring disposal',
      );
    }
    return drained;
  }

  private waitForIdle(graceMs: number): Promise<boolean> {
    if (this.inFlight === 0) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.idleWaiters = this.idleWaiters.filter((w) => w !== wake);
        resolve(false);
      }, graceMs);
      this.idleWaiters.push(wake);
    });
  }

  private async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    // Reverse registration order, like a stack of acquired resources
    for (const listener of [...this.disposeListeners].reverse()) {
      try {
        await listener();
      } catch (err) {
        logger.warn({ plugin: this.name, err }, 'Plugin dispose listener failed');
      }
    }
  }
}
