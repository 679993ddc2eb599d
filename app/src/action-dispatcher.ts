/**
 * Action Dispatcher
 *
 * Invokes one named action on an enabled plugin and always answers with an
 * ActionInvocationResult; nothing a plugin does escapes as an exception.
 */

import { errorMessage, formatError, logger, type PluginErrorCode } from '@plugin-runtime/core';
import type { EventBus } from '@plugin-runtime/event-bus';
import type { PluginHandle } from './plugin-handle.js';
import type { PluginRegistry } from './plugin-registry.js';
import type { ActionInvocationResult } from './plugin-types.js';
import { TimeoutError, withTimeout } from './timeout.js';

export interface ActionDispatcherOptions {
  registry: PluginRegistry;
  events: EventBus;
  /** Per-call deadline for a handler */
  actionTimeoutMs: number;
}

export interface ExecuteOptions {
  /** Set when the call comes from a hook trigger */
  hookName?: string;
}

function elapsedSeconds(startedAt: number): number {
  return (performance.now() - startedAt) / 1000;
}

export class ActionDispatcher {
  private readonly registry: PluginRegistry;
  private readonly events: EventBus;
  private readonly actionTimeoutMs: number;

  constructor(options: ActionDispatcherOptions) {
    this.registry = options.registry;
    this.events = options.events;
    this.actionTimeoutMs = options.actionTimeoutMs;
  }

  async execute(
    pluginName: string,
    action: string,
    params: Record<string, unknown> = {},
    options: ExecuteOptions = {},
  ): Promise<ActionInvocationResult> {
    const startedAt = performance.now();
    const timestamp = new Date().toISOString();

    const fail = (errorCode: PluginErrorCode, error: string): ActionInvocationResult => {
      const result: ActionInvocationResult = {
        success: false,
        error,
        errorCode,
        executionTime: elapsedSeconds(startedAt),
        timestamp,
      };
      this.events.emit('action:executed', {
        pluginName,
        action,
        success: false,
        executionTime: result.executionTime,
        errorCode,
      });
      return result;
    };

    const lease = this.registry.acquire(pluginName);
    if (!lease.ok) {
      return fail(lease.error.code, lease.error.message);
    }

    const { handle } = lease.value;
    if (!handle.hasAction(action)) {
      lease.value.release();
      return fail('UnknownAction', `Plugin ${pluginName} has no action ${action}`);
    }

    const call = handle.invoke(action, params, {
      pluginName,
      action,
      hookName: options.hookName,
    });

    try {
      const value = await withTimeout(
        call,
        this.actionTimeoutMs,
        `Action ${pluginName}.${action} timed out after ${this.actionTimeoutMs}ms`,
      );
      lease.value.release();
      const executionTime = elapsedSeconds(startedAt);
      this.events.emit('action:executed', {
        pluginName,
        action,
        success: true,
        executionTime,
      });
      return { success: true, result: value, executionTime, timestamp };
    } catch (cause) {
      if (cause instanceof TimeoutError) {
        // The handler keeps its slot until it actually settles
        this.settleLate(pluginName, action, call, () => lease.value.release(), handle);
        this.registry.recordError(pluginName, cause.message);
        logger.warn({ plugin: pluginName, action, timeoutMs: this.actionTimeoutMs }, 'Plugin action timed out');
        return fail('Timeout', cause.message);
      }

      lease.value.release();
      const message = errorMessage(cause);
      this.registry.recordError(pluginName, message);
      logger.warn({ plugin: pluginName, action, error: formatError(cause) }, 'Plugin action failed');
      return fail('ExecutionFailure', message);
    }
  }

  private settleLate(
    pluginName: string,
    action: string,
    call: Promise<unknown>,
    release: () => void,
    handle: PluginHandle,
  ): void {
    void call.then(
      () => {
        release();
        logger.debug({ plugin: pluginName, action }, 'Timed-out action finished late');
      },
      (cause: unknown) => {
        release();
        const message = `Action ${action} failed after timing out: ${errorMessage(cause)}`;
        this.registry.reportFault(pluginName, handle, message).catch((faultErr: unknown) => {
          logger.error({ plugin: pluginName, err: faultErr }, 'Failed to record late plugin fault');
        });
      },
    );
  }
}
