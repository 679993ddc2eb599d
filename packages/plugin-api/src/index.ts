// ============================================================================
// Plugin artifact contract
// ============================================================================

/**
 * A plugin is a single CommonJS-style JavaScript file stored as
 * `<pluginsDir>/<name>.js`. It is evaluated in a fresh VM context (no
 * `require`, no host globals beyond timers, `URL`, text codecs and
 * `structuredClone`) and must export one entry point:
 *
 * ```js
 * exports.register = function (host) {
 *   host.describe({ version: '1.0.0', description: 'Weather lookups', author: 'Jane' });
 *   host.action('handle_message', async (params) => ({ reply: `Echo: ${params.text}` }));
 *   host.hook('on_message', 'handle_message');
 * };
 * ```
 */
export type RegisterFunction = (host: PluginHost) => void | Promise<void>;

export interface PluginModuleExports {
  register?: RegisterFunction;
}

// ============================================================================
// Host capabilities (passed to register)
// ============================================================================

export interface PluginHost {
  /** Name the plugin was installed under */
  readonly name: string;
  /** Frozen copy of the plugin's configuration at load time */
  readonly config: Readonly<Record<string, unknown>>;
  /** Logger namespaced to this plugin */
  readonly logger: PluginLogger;

  /** Supply descriptor metadata */
  describe(metadata: PluginMetadata): void;
  /** Expose an action invocable through the action dispatcher */
  action(name: string, handler: ActionHandler): void;
  /** Bind one of this plugin's actions to a named hook once enabled */
  hook(hookName: string, actionName: string): void;
  /** Declare the shape of valid config keys (opaque to the runtime) */
  configSchema(schema: Record<string, unknown>): void;
  /**
   * Accept configuration updates without a reload. Plugins that never call
   * this are disabled and re-enabled when their config changes.
   */
  onConfigure(listener: ConfigureListener): void;
  /** Release resources when the plugin is retired */
  onDispose(listener: DisposeListener): void;
}

export interface PluginMetadata {
  version?: string;
  description?: string;
  author?: string;
}

export interface PluginLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Actions
// ============================================================================

export interface ActionContext {
  pluginName: string;
  action: string;
  /** Set when the invocation comes from a hook trigger */
  hookName?: string;
}

export type ActionHandler = (
  params: Record<string, unknown>,
  context: ActionContext,
) => unknown;

export type ConfigureListener = (
  config: Readonly<Record<string, unknown>>,
) => void | Promise<void>;

export type DisposeListener = () => void | Promise<void>;
