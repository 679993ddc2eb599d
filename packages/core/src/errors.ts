/**
 * Error taxonomy for the plugin runtime.
 *
 * Failures crossing a plugin-code boundary are converted into a
 * `PluginRuntimeError` and returned as values; only programmer errors throw.
 */

export type PluginErrorCode =
  /** Persisted plugin config missing or corrupt; an empty mapping is assumed */
  | 'ConfigUnavailable'
  | 'NotFound'
  | 'InvalidName'
  /** Artifact does not compile; no plugin code has run */
  | 'InvalidSource'
  | 'MissingEntryPoint'
  | 'InitFailure'
  | 'FetchError'
  | 'UnknownPlugin'
  | 'UnknownAction'
  | 'NotEnabled'
  /** Hook binding target is no longer active */
  | 'PluginDisabled'
  | 'ExecutionFailure'
  | 'Timeout'
  /** Artifact or plugin config file could not be written */
  | 'StorageFailure';

/** Codes produced while turning an artifact into a live handle */
export type LoadErrorCode = Extract<
  PluginErrorCode,
  'InvalidSource' | 'MissingEntryPoint' | 'InitFailure'
>;

export class PluginRuntimeError extends Error {
  readonly code: PluginErrorCode;
  readonly pluginName?: string;
  override readonly cause?: unknown;

  constructor(
    code: PluginErrorCode,
    message: string,
    options?: { pluginName?: string; cause?: unknown },
  ) {
    super(message);
    this.name = 'PluginRuntimeError';
    this.code = code;
    this.pluginName = options?.pluginName;
    this.cause = options?.cause;
  }

  toJSON(): { code: PluginErrorCode; message: string; pluginName?: string } {
    return {
      code: this.code,
      message: this.message,
      pluginName: this.pluginName,
    };
  }
}
