/**
 * Runtime-side plugin types: re-exports from @plugin-runtime/plugin-api
 * plus the registry, hook and invocation records used across the runtime.
 */

import type { PluginErrorCode } from '@plugin-runtime/core';

export type {
  ActionContext,
  ActionHandler,
  ConfigureListener,
  DisposeListener,
  PluginHost,
  PluginLogger,
  PluginMetadata,
  PluginModuleExports,
  RegisterFunction,
} from '@plugin-runtime/plugin-api';

// ============================================================================
// Descriptor & lifecycle state
// ============================================================================

export type PluginStatus =
  | 'unregistered'
  | 'installed-disabled'
  | 'loading'
  | 'enabled'
  | 'errored'
  | 'disabling'
  | 'unloaded';

export interface PluginDescriptor {
  name: string;
  version: string;
  description: string;
  author: string;
  filePath: string;
  config: Record<string, unknown>;
  configSchema: Record<string, unknown>;
  availableActions: string[];
}

export interface PluginRuntimeState {
  status: PluginStatus;
  /** ISO timestamp of the last successful load */
  loadedAt: string | null;
  lastError: string | null;
  /** Epoch ms; set only while enabled */
  enabledSince: number | null;
}

export interface PluginStatusRecord {
  name: string;
  status: PluginStatus;
  enabled: boolean;
  lastError: string | null;
  loadedAt: string | null;
  /** Seconds since the plugin became enabled, null otherwise */
  uptime: number | null;
}

export type PluginInfo = PluginDescriptor & PluginStatusRecord;

export interface PluginSummary {
  name: string;
  version: string;
  status: PluginStatus;
  enabled: boolean;
  lastError: string | null;
}

export interface PluginListing {
  plugins: PluginSummary[];
  totalCount: number;
  enabledCount: number;
  disabledCount: number;
  erroredCount: number;
}

export interface InstallOptions {
  /** Enable right after installing (default: true) */
  autoEnable?: boolean;
  /** Initial plugin configuration */
  config?: Record<string, unknown>;
}

export interface InstallOutcome {
  descriptor: PluginDescriptor;
  status: PluginStatusRecord;
  installedAt: string;
}

export type ConfigUpdateMode = 'stored' | 'live' | 'reloaded';

// ============================================================================
// Hooks & invocations
// ============================================================================

export interface HookBinding {
  hookName: string;
  pluginName: string;
  callbackAction: string;
}

export interface ActionInvocationResult {
  success: boolean;
  result?: unknown;
  /** Present iff success is false */
  error?: string;
  errorCode?: PluginErrorCode;
  /** Wall-clock seconds */
  executionTime: number;
  timestamp: string;
}

export type HookInvocationResult = ActionInvocationResult & {
  pluginName: string;
  callbackAction: string;
};

export interface HookTriggerResult {
  hookName: string;
  /** One entry per binding, in registration order */
  results: HookInvocationResult[];
}
