/**
 * Lifecycle events emitted by the plugin runtime.
 * All payloads are plain data (no class instances, no functions).
 */
export interface RuntimeEventMap {
  'plugin:installed': {
    name: string;
    filePath: string;
    autoEnable: boolean;
  };
  'plugin:enabled': {
    name: string;
    version: string;
    actions: string[];
    /** Hook bindings the plugin declared while registering */
    hooks: Array<{ hookName: string; action: string }>;
  };
  'plugin:disabled': {
    name: string;
  };
  'plugin:errored': {
    name: string;
    error: string;
  };
  'plugin:unloaded': {
    name: string;
    reason: 'unloaded' | 'replaced';
  };
  'plugin:config-updated': {
    name: string;
    mode: 'stored' | 'live' | 'reloaded';
  };
  'hook:registered': {
    hookName: string;
    pluginName: string;
    callbackAction: string;
  };
  'hook:triggered': {
    hookName: string;
    bindings: number;
    failures: number;
  };
  'action:executed': {
    pluginName: string;
    action: string;
    success: boolean;
    executionTime: number;
    errorCode?: string;
  };
}
