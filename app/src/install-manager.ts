/**
 * Install Manager
 *
 * Accepts plugin artifacts as raw bytes or from a URL, works out the plugin
 * name, checks the source compiles, then hands it to the registry. The
 * download happens before any per-plugin lock is taken.
 */

import path from 'path';
import {
  err,
  errorMessage,
  logger,
  ok,
  PluginRuntimeError,
  type Result,
} from '@plugin-runtime/core';
import { isValidPluginName, PLUGIN_EXTENSION } from './plugin-discovery.js';
import { compilePluginSource } from './plugin-loader.js';
import type { PluginRegistry } from './plugin-registry.js';
import type { InstallOptions, InstallOutcome } from './plugin-types.js';

export interface InstallManagerOptions {
  registry: PluginRegistry;
  maxPluginSizeBytes: number;
  fetchTimeoutMs: number;
}

export interface InstallRequest extends InstallOptions {
  /** Explicit plugin name; wins over every other source */
  name?: string;
  /** Original file name; its stem names the plugin when `name` is absent */
  filename?: string;
}

const NAME_PRAGMA_RE = /^\s*\/\/\s*@plugin-name\s+(\S+)/m;

function stem(fileName: string): string {
  const base = path.posix.basename(fileName);
  return base.endsWith(PLUGIN_EXTENSION) ? base.slice(0, -PLUGIN_EXTENSION.length) : base;
}

/**
 * Pick the plugin name: explicit name, filename stem, URL path stem, then a
 * `// @plugin-name <name>` line in the source.
 */
export function resolvePluginName(
  source: string,
  hints: { name?: string; filename?: string; url?: string },
): string | null {
  if (hints.name) return hints.name;
  if (hints.filename) return stem(hints.filename);
  if (hints.url) {
    const urlStem = stem(new URL(hints.url).pathname);
    if (urlStem) return urlStem;
  }
  return NAME_PRAGMA_RE.exec(source)?.[1] ?? null;
}

export class InstallManager {
  private readonly registry: PluginRegistry;
  private readonly maxPluginSizeBytes: number;
  private readonly fetchTimeoutMs: number;

  constructor(options: InstallManagerOptions) {
    this.registry = options.registry;
    this.maxPluginSizeBytes = options.maxPluginSizeBytes;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
  }

  async installFromBytes(
    bytes: Uint8Array,
    request: InstallRequest = {},
  ): Promise<Result<InstallOutcome, PluginRuntimeError>> {
    return this.install(bytes, request);
  }

  async installFromUrl(
    url: string,
    request: InstallRequest = {},
  ): Promise<Result<InstallOutcome, PluginRuntimeError>> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return err(new PluginRuntimeError('FetchError', `Invalid plugin URL: ${url}`));
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return err(
        new PluginRuntimeError('FetchError', `Unsupported URL protocol: ${parsed.protocol}`),
      );
    }

    const downloaded = await this.download(parsed);
    if (!downloaded.ok) return downloaded;
    return this.install(downloaded.value, { ...request, url: parsed.href });
  }

  private async download(url: URL): Promise<Result<Uint8Array, PluginRuntimeError>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.fetchTimeoutMs);
    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        return err(
          new PluginRuntimeError(
            'FetchError',
            `Failed to download plugin: HTTP ${response.status}`,
          ),
        );
      }
      const declared = Number(response.headers.get('content-length'));
      if (Number.isFinite(declared) && declared > this.maxPluginSizeBytes) {
        controller.abort();
        return err(this.tooLarge(`Plugin source is ${declared} bytes, limit is ${this.maxPluginSizeBytes}`));
      }

      const bytes = await this.readCapped(response, controller);
      if (!bytes.ok) return bytes;
      logger.debug({ url: url.href, bytes: bytes.value.byteLength }, 'Plugin downloaded');
      return bytes;
    } catch (cause) {
      const message = controller.signal.aborted
        ? `Download timed out after ${this.fetchTimeoutMs}ms`
        : `Failed to download plugin: ${errorMessage(cause)}`;
      logger.warn({ url: url.href, reason: message }, 'Plugin download failed');
      return err(new PluginRuntimeError('FetchError', message, { cause }));
    } finally {
      clearTimeout(timer);
    }
  }

  /** Read the body, giving up as soon as it outgrows the size limit. */
  private async readCapped(
    response: Response,
    controller: AbortController,
  ): Promise<Result<Uint8Array, PluginRuntimeError>> {
    if (!response.body) return ok(new Uint8Array(await response.arrayBuffer()));

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let total = 0;
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      total += value.byteLength;
      if (total > this.maxPluginSizeBytes) {
        controller.abort();
        reader.cancel().catch((cause: unknown) => {
          logger.debug({ err: cause }, 'Cancelling oversized download failed');
        });
        return err(this.tooLarge(`Plugin source exceeds the ${this.maxPluginSizeBytes} byte limit`));
      }
      chunks.push(value);
    }
    return ok(Buffer.concat(chunks));
  }

  private tooLarge(message: string): PluginRuntimeError {
    logger.warn({ reason: message }, 'Plugin download rejected');
    return new PluginRuntimeError('InvalidSource', message);
  }

  private async install(
    bytes: Uint8Array,
    request: InstallRequest & { url?: string },
  ): Promise<Result<InstallOutcome, PluginRuntimeError>> {
    if (bytes.byteLength === 0) {
      return err(new PluginRuntimeError('InvalidSource', 'Plugin source is empty'));
    }
    if (bytes.byteLength > this.maxPluginSizeBytes) {
      return err(
        new PluginRuntimeError(
          'InvalidSource',
          `Plugin source is ${bytes.byteLength} bytes, limit is ${this.maxPluginSizeBytes}`,
        ),
      );
    }

    let source: string;
    try {
      source = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (cause) {
      return err(
        new PluginRuntimeError('InvalidSource', 'Plugin source is not valid UTF-8', { cause }),
      );
    }

    const name = resolvePluginName(source, request);
    if (name === null || !isValidPluginName(name)) {
      return err(
        new PluginRuntimeError(
          'InvalidName',
          name === null
            ? 'Cannot determine plugin name; pass a name or filename'
            : `Invalid plugin name: ${JSON.stringify(name)}`,
          { pluginName: name ?? undefined },
        ),
      );
    }

    const compiled = compilePluginSource(source, `${name}${PLUGIN_EXTENSION}`);
    if (!compiled.ok) {
      return err(
        new PluginRuntimeError('InvalidSource', compiled.error.message, {
          pluginName: name,
          cause: compiled.error.cause,
        }),
      );
    }

    return this.registry.install(name, source, {
      autoEnable: request.autoEnable,
      config: request.config,
    });
  }
}
