/**
 * Plugin Loader
 *
 * Turns a plugin artifact into a live PluginHandle. Each load compiles the
 * source and evaluates it in a brand-new `vm` context, so nothing declared by
 * one load is visible to another and the usual module globals (`require`,
 * `process`) are absent. This is a namespace, not a security boundary: the
 * objects handed to the plugin come from the host realm, so trusted code only.
 */

import fs from 'fs/promises';
import { createContext, Script } from 'node:vm';
import {
  err,
  errorMessage,
  logger,
  ok,
  PluginRuntimeError,
  type LoadErrorCode,
  type Result,
} from '@plugin-runtime/core';
import { PluginHandle, type HookDeclaration } from './plugin-handle.js';
import type {
  ActionHandler,
  ConfigureListener,
  DisposeListener,
  PluginHost,
  PluginLogger,
  PluginMetadata,
} from './plugin-types.js';
import { withTimeout } from './timeout.js';

/** Receives failures raised by a loaded plugin outside any call, e.g. in a timer */
export type PluginFaultListener = (handle: PluginHandle, message: string) => void;

export interface PluginLoaderOptions {
  /** Upper bound for an async register() */
  loadTimeoutMs: number;
  /** Upper bound for synchronous top-level evaluation (default: 1000) */
  evalTimeoutMs?: number;
}

const NAME_RE = /^[A-Za-z0-9_.:-]+$/;

// ============================================================================
// Compilation
// ============================================================================

/** CommonJS-style wrapper: `exports` and `module` are the only module bindings */
function wrapSource(source: string): string {
  return `(function (exports, module) {\n${source}\n})(module.exports, module);`;
}

/**
 * Compile plugin source without running any of it.
 * A syntax error yields InvalidSource.
 */
export function compilePluginSource(
  source: string,
  filename: string,
): Result<Script, PluginRuntimeError> {
  try {
    return ok(new Script(wrapSource(source), { filename, lineOffset: -1 }));
  } catch (cause) {
    return err(
      new PluginRuntimeError(
        'InvalidSource',
        `Plugin source does not compile: ${errorMessage(cause)}`,
        { cause },
      ),
    );
  }
}

// ============================================================================
// Plugin context
// ============================================================================

interface ModuleRecord {
  exports: unknown;
}

function createPluginLogger(pluginName: string): PluginLogger {
  return {
    info: (msg, ...args) => logger.info({ plugin: pluginName, args }, msg),
    warn: (msg, ...args) => logger.warn({ plugin: pluginName, args }, msg),
    error: (msg, ...args) => logger.error({ plugin: pluginName, args }, msg),
    debug: (msg, ...args) => logger.debug({ plugin: pluginName, args }, msg),
  };
}

/**
 * Timers handed to a plugin are tracked so they can be cleared when the
 * plugin is retired. A throwing callback is reported to `onError` and never
 * reaches the host's event loop.
 */
class PluginTimers {
  private readonly timeouts = new Set<ReturnType<typeof setTimeout>>();
  private readonly intervals = new Set<ReturnType<typeof setInterval>>();

  constructor(private readonly onError: (cause: unknown) => void) {}

  readonly setTimeout = (fn: () => void, ms?: number): ReturnType<typeof setTimeout> => {
    const id = setTimeout(() => {
      this.timeouts.delete(id);
      this.run(fn);
    }, ms);
    this.timeouts.add(id);
    return id;
  };

  readonly clearTimeout = (id: ReturnType<typeof setTimeout>): void => {
    this.timeouts.delete(id);
    clearTimeout(id);
  };

  readonly setInterval = (fn: () => void, ms?: number): ReturnType<typeof setInterval> => {
    const id = setInterval(() => this.run(fn), ms);
    this.intervals.add(id);
    return id;
  };

  readonly clearInterval = (id: ReturnType<typeof setInterval>): void => {
    this.intervals.delete(id);
    clearInterval(id);
  };

  clearAll(): void {
    for (const id of this.timeouts) clearTimeout(id);
    for (const id of this.intervals) clearInterval(id);
    this.timeouts.clear();
    this.intervals.clear();
  }

  private run(fn: () => void): void {
    try {
      fn();
    } catch (cause) {
      this.onError(cause);
    }
  }
}

function buildContextGlobals(
  pluginLogger: PluginLogger,
  timers: PluginTimers,
  moduleRecord: ModuleRecord,
): Record<string, unknown> {
  return {
    module: moduleRecord,
    console: {
      log: pluginLogger.info,
      info: pluginLogger.info,
      warn: pluginLogger.warn,
      error: pluginLogger.error,
      debug: pluginLogger.debug,
    },
    setTimeout: timers.setTimeout,
    clearTimeout: timers.clearTimeout,
    setInterval: timers.setInterval,
    clearInterval: timers.clearInterval,
    URL,
    URLSearchParams,
    TextEncoder,
    TextDecoder,
    structuredClone,
  };
}

function readEntryPoint(moduleExports: unknown): ((host: PluginHost) => unknown) | null {
  if (
    typeof moduleExports !== 'object' ||
    moduleExports === null ||
    !('register' in moduleExports)
  ) {
    return null;
  }
  const register = moduleExports.register;
  if (typeof register !== 'function') return null;
  return (host) => Reflect.apply(register, moduleExports, [host]);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

// ============================================================================
// Registration host
// ============================================================================

/**
 * Collects everything a plugin declares during register(). Once sealed,
 * further declarations throw.
 */
class RegistrationBuilder {
  private sealed = false;
  private metadata: Required<PluginMetadata> = {
    version: '0.0.0',
    description: '',
    author: '',
  };
  private readonly actions = new Map<string, ActionHandler>();
  private readonly hooks: HookDeclaration[] = [];
  private schema: Record<string, unknown> = {};
  private readonly configureListeners: ConfigureListener[] = [];
  private readonly disposeListeners: DisposeListener[] = [];

  readonly host: PluginHost;

  constructor(
    private readonly name: string,
    config: Record<string, unknown>,
    pluginLogger: PluginLogger,
    timers: PluginTimers,
  ) {
    // Runs last on dispose: listeners registered by the plugin may still clear their own timers
    this.disposeListeners.push(() => timers.clearAll());

    const frozenConfig = Object.freeze(structuredClone(config));
    this.host = {
      name,
      config: frozenConfig,
      logger: pluginLogger,
      describe: (metadata) => {
        this.assertOpen('describe');
        if (typeof metadata !== 'object' || metadata === null) return;
        for (const key of ['version', 'description', 'author'] as const) {
          const value = metadata[key];
          if (typeof value === 'string') this.metadata[key] = value;
        }
      },
      action: (actionName, handler) => {
        this.assertOpen('action');
        this.assertName(actionName, 'Action name');
        if (typeof handler !== 'function') {
          throw new TypeError(`Handler for action ${actionName} must be a function`);
        }
        if (this.actions.has(actionName)) {
          throw new Error(`Action ${actionName} is already registered`);
        }
        this.actions.set(actionName, handler);
      },
      hook: (hookName, actionName) => {
        this.assertOpen('hook');
        this.assertName(hookName, 'Hook name');
        this.assertName(actionName, 'Action name');
        const exists = this.hooks.some(
          (h) => h.hookName === hookName && h.action === actionName,
        );
        if (!exists) this.hooks.push({ hookName, action: actionName });
      },
      configSchema: (schema) => {
        this.assertOpen('configSchema');
        if (typeof schema === 'object' && schema !== null) {
          this.schema = structuredClone(schema);
        }
      },
      onConfigure: (listener) => {
        this.assertOpen('onConfigure');
        if (typeof listener !== 'function') {
          throw new TypeError('onConfigure listener must be a function');
        }
        this.configureListeners.push(listener);
      },
      onDispose: (listener) => {
        this.assertOpen('onDispose');
        if (typeof listener !== 'function') {
          throw new TypeError('onDispose listener must be a function');
        }
        this.disposeListeners.push(listener);
      },
    };
  }

  seal(): PluginHandle {
    this.sealed = true;
    const dangling = this.hooks.find((h) => !this.actions.has(h.action));
    if (dangling) {
      throw new Error(
        `Hook ${dangling.hookName} references undeclared action ${dangling.action}`,
      );
    }
    return new PluginHandle({
      name: this.name,
      ...this.metadata,
      actions: this.actions,
      hooks: this.hooks,
      configSchema: this.schema,
      configureListeners: this.configureListeners,
      disposeListeners: this.disposeListeners,
    });
  }

  private assertOpen(method: string): void {
    if (this.sealed) {
      throw new Error(`host.${method}() called after registration finished`);
    }
  }

  private assertName(value: unknown, label: string): void {
    if (typeof value !== 'string' || !NAME_RE.test(value)) {
      throw new TypeError(`${label} must match ${NAME_RE}, got ${String(value)}`);
    }
  }
}

// ============================================================================
// Loader
// ============================================================================

export class PluginLoader {
  private readonly loadTimeoutMs: number;
  private readonly evalTimeoutMs: number;

  constructor(options: PluginLoaderOptions) {
    this.loadTimeoutMs = options.loadTimeoutMs;
    this.evalTimeoutMs = options.evalTimeoutMs ?? 1000;
  }

  /**
   * `onFault` hears about failures the plugin raises after it is loaded and
   * outside any action call.
   */
  async load(
    name: string,
    filePath: string,
    config: Record<string, unknown>,
    onFault?: PluginFaultListener,
  ): Promise<Result<PluginHandle, PluginRuntimeError>> {
    let source: string;
    try {
      source = await fs.readFile(filePath, 'utf-8');
    } catch (cause) {
      return this.fail(
        'InitFailure',
        name,
        `Cannot read plugin artifact ${filePath}: ${errorMessage(cause)}`,
        cause,
      );
    }

    const compiled = compilePluginSource(source, filePath);
    if (!compiled.ok) {
      return this.fail('InvalidSource', name, compiled.error.message, compiled.error.cause);
    }

    const pluginLogger = createPluginLogger(name);
    let loaded: PluginHandle | null = null;
    const timers = new PluginTimers((cause) => {
      const message = `Plugin ${name} timer callback failed: ${errorMessage(cause)}`;
      pluginLogger.error(message);
      if (loaded && onFault) onFault(loaded, message);
    });
    const moduleRecord: ModuleRecord = { exports: {} };
    const context = createContext(
      buildContextGlobals(pluginLogger, timers, moduleRecord),
      {
        name: `plugin:${name}`,
        codeGeneration: { strings: false, wasm: false },
      },
    );

    try {
      compiled.value.runInContext(context, {
        timeout: this.evalTimeoutMs,
        displayErrors: false,
      });
    } catch (cause) {
      timers.clearAll();
      return this.fail(
        'InitFailure',
        name,
        `Plugin ${name} failed to evaluate: ${errorMessage(cause)}`,
        cause,
      );
    }

    const register = readEntryPoint(moduleRecord.exports);
    if (!register) {
      timers.clearAll();
      return this.fail(
        'MissingEntryPoint',
        name,
        `Plugin ${name} does not export a register(host) function`,
      );
    }

    const builder = new RegistrationBuilder(name, config, pluginLogger, timers);
    try {
      const returned = register(builder.host);
      if (isPromiseLike(returned)) {
        await withTimeout(
          Promise.resolve(returned),
          this.loadTimeoutMs,
          `register() did not finish within ${this.loadTimeoutMs}ms`,
        );
      }
      const handle = builder.seal();
      loaded = handle;
      logger.info(
        { plugin: name, version: handle.version, actions: handle.actionNames },
        'Plugin loaded',
      );
      return ok(handle);
    } catch (cause) {
      timers.clearAll();
      return this.fail(
        'InitFailure',
        name,
        `Plugin ${name} failed to register: ${errorMessage(cause)}`,
        cause,
      );
    }
  }

  private fail(
    code: LoadErrorCode,
    pluginName: string,
    message: string,
    cause?: unknown,
  ): Result<never, PluginRuntimeError> {
    logger.warn({ plugin: pluginName, code, reason: message }, 'Plugin failed to load');
    return err(new PluginRuntimeError(code, message, { pluginName, cause }));
  }
}
