/**
 * Hook Bus
 *
 * Maps hook names to (plugin, action) bindings and fans a trigger out to
 * every binding. Bindings outlive a disable, so a trigger reports the
 * target as disabled instead of silently skipping it; they are dropped when
 * the plugin is unloaded or replaced.
 */

import {
  err,
  logger,
  ok,
  PluginRuntimeError,
  type Result,
} from '@plugin-runtime/core';
import type { EventBus } from '@plugin-runtime/event-bus';
import type { ActionDispatcher } from './action-dispatcher.js';
import type { PluginRegistry } from './plugin-registry.js';
import type {
  HookBinding,
  HookInvocationResult,
  HookTriggerResult,
} from './plugin-types.js';

export interface HookBusOptions {
  registry: PluginRegistry;
  dispatcher: ActionDispatcher;
  events: EventBus;
}

function sameBinding(a: HookBinding, b: HookBinding): boolean {
  return (
    a.hookName === b.hookName &&
    a.pluginName === b.pluginName &&
    a.callbackAction === b.callbackAction
  );
}

export class HookBus {
  private readonly registry: PluginRegistry;
  private readonly dispatcher: ActionDispatcher;
  private readonly events: EventBus;
  private readonly bindings = new Map<string, HookBinding[]>();
  private readonly unsubscribers: Array<() => void>;

  constructor(options: HookBusOptions) {
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.events = options.events;

    this.unsubscribers = [
      this.events.on('plugin:enabled', ({ name, hooks }) => {
        for (const hook of hooks) {
          this.bind({ hookName: hook.hookName, pluginName: name, callbackAction: hook.action });
        }
      }),
      this.events.on('plugin:unloaded', ({ name }) => {
        this.dropPlugin(name);
      }),
    ];
  }

  /**
   * Bind `callbackAction` of an enabled plugin to `hookName`.
   * Registering the same triple twice keeps a single binding.
   */
  register(
    hookName: string,
    pluginName: string,
    callbackAction: string,
  ): Result<HookBinding, PluginRuntimeError> {
    const info = this.registry.getInfo(pluginName);
    if (!info.ok || !info.value.enabled) {
      return err(
        new PluginRuntimeError(
          'UnknownPlugin',
          `Plugin ${pluginName} is not loaded or not enabled`,
          { pluginName },
        ),
      );
    }
    if (!info.value.availableActions.includes(callbackAction)) {
      return err(
        new PluginRuntimeError(
          'UnknownAction',
          `Plugin ${pluginName} has no action ${callbackAction}`,
          { pluginName },
        ),
      );
    }
    return ok(this.bind({ hookName, pluginName, callbackAction }));
  }

  /** Remove one binding. Returns false when it did not exist. */
  unregister(hookName: string, pluginName: string, callbackAction: string): boolean {
    const list = this.bindings.get(hookName);
    if (!list) return false;
    const target = { hookName, pluginName, callbackAction };
    const remaining = list.filter((binding) => !sameBinding(binding, target));
    if (remaining.length === list.length) return false;
    this.store(hookName, remaining);
    return true;
  }

  listBindings(hookName?: string): HookBinding[] {
    if (hookName !== undefined) {
      return (this.bindings.get(hookName) ?? []).map((b) => ({ ...b }));
    }
    return [...this.bindings.values()].flat().map((b) => ({ ...b }));
  }

  /**
   * Invoke every binding of `hookName` concurrently. Results keep
   * registration order; one binding's failure never affects another.
   */
  async trigger(
    hookName: string,
    params: Record<string, unknown> = {},
  ): Promise<Result<HookTriggerResult, PluginRuntimeError>> {
    const snapshot = this.listBindings(hookName);
    if (snapshot.length === 0) {
      return err(
        new PluginRuntimeError('NotFound', `No plugins registered for hook ${hookName}`),
      );
    }

    const results = await Promise.all(
      snapshot.map((binding) => this.invokeBinding(binding, params)),
    );

    const failures = results.filter((r) => !r.success).length;
    logger.debug({ hookName, bindings: results.length, failures }, 'Hook triggered');
    this.events.emit('hook:triggered', { hookName, bindings: results.length, failures });
    return ok({ hookName, results });
  }

  /** Stop following registry events. */
  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    this.bindings.clear();
  }

  private async invokeBinding(
    binding: HookBinding,
    params: Record<string, unknown>,
  ): Promise<HookInvocationResult> {
    const { pluginName, callbackAction, hookName } = binding;

    if (this.registry.lifecycleStatus(pluginName) !== 'enabled') {
      return {
        pluginName,
        callbackAction,
        success: false,
        error: `Plugin ${pluginName} is disabled`,
        errorCode: 'PluginDisabled',
        executionTime: 0,
        timestamp: new Date().toISOString(),
      };
    }

    const result = await this.dispatcher.execute(pluginName, callbackAction, params, {
      hookName,
    });
    // Lost a race with disable between the status check and the call
    if (result.errorCode === 'NotEnabled') {
      return { ...result, pluginName, callbackAction, errorCode: 'PluginDisabled' };
    }
    return { ...result, pluginName, callbackAction };
  }

  private bind(binding: HookBinding): HookBinding {
    const list = this.bindings.get(binding.hookName) ?? [];
    const existing = list.find((b) => sameBinding(b, binding));
    if (existing) return { ...existing };

    this.store(binding.hookName, [...list, binding]);
    logger.info(
      { hookName: binding.hookName, plugin: binding.pluginName, action: binding.callbackAction },
      'Hook registered',
    );
    this.events.emit('hook:registered', { ...binding });
    return { ...binding };
  }

  private dropPlugin(pluginName: string): void {
    for (const [hookName, list] of this.bindings) {
      this.store(
        hookName,
        list.filter((binding) => binding.pluginName !== pluginName),
      );
    }
  }

  private store(hookName: string, list: HookBinding[]): void {
    if (list.length === 0) {
      this.bindings.delete(hookName);
    } else {
      this.bindings.set(hookName, list);
    }
  }
}
