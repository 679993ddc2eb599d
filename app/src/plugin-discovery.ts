/**
 * Plugin Discovery
 *
 * Read-only scan of the plugins directory. One artifact per plugin:
 * `<pluginsDir>/<name>.js`. Sidecar files (`<name>.config.json`, the enabled
 * map, temp files) are ignored.
 */

import path from 'path';
import fs from 'fs';
import { logger } from '@plugin-runtime/core';

export const PLUGIN_EXTENSION = '.js';

/** Plugin names double as file names, so keep them path-safe */
export const PLUGIN_NAME_RE = /^[a-zA-Z0-9_-]+$/;

/**
 * Names that pass the pattern but cannot be plugins: object keys with special
 * meaning in the enabled map, and the fixed segments of the HTTP API.
 */
export const RESERVED_PLUGIN_NAMES: ReadonlySet<string> = new Set([
  '__proto__',
  'constructor',
  'prototype',
  'hooks',
  'install',
  'load',
  'upload',
]);

export interface DiscoveredArtifact {
  name: string;
  filePath: string;
}

export function isValidPluginName(name: string): boolean {
  return PLUGIN_NAME_RE.test(name) && name.length <= 100 && !RESERVED_PLUGIN_NAMES.has(name);
}

/** Deterministic artifact location for a plugin name. */
export function artifactPath(pluginsDir: string, name: string): string {
  return path.join(path.resolve(pluginsDir), `${name}${PLUGIN_EXTENSION}`);
}

/** Location of the per-plugin configuration file. */
export function pluginConfigPath(pluginsDir: string, name: string): string {
  return path.join(path.resolve(pluginsDir), `${name}.config.json`);
}

/**
 * Scan a plugins directory for artifacts, sorted by name.
 * Symlinks, dotfiles and names that are not valid plugin names are skipped.
 */
export function discoverPluginArtifacts(pluginsDir: string): DiscoveredArtifact[] {
  if (!fs.existsSync(pluginsDir)) {
    return [];
  }

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(pluginsDir, { withFileTypes: true });
  } catch (err) {
    logger.warn({ err, pluginsDir }, 'Failed to read plugins directory');
    return [];
  }

  const resolvedPluginsDir = path.resolve(pluginsDir);
  const discovered: DiscoveredArtifact[] = [];

  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    if (path.extname(entry.name) !== PLUGIN_EXTENSION) continue;

    // Symlinks report isSymbolicLink() and never isFile() on a Dirent
    if (entry.isSymbolicLink()) {
      logger.warn(
        { path: path.join(resolvedPluginsDir, entry.name) },
        'Skipping symlinked plugin artifact',
      );
      continue;
    }
    if (!entry.isFile()) continue;

    const name = path.basename(entry.name, PLUGIN_EXTENSION);
    if (!isValidPluginName(name)) {
      logger.debug({ file: entry.name }, 'Artifact name is not a valid plugin name, skipping');
      continue;
    }

    discovered.push({ name, filePath: artifactPath(resolvedPluginsDir, name) });
  }

  discovered.sort((a, b) => a.name.localeCompare(b.name));
  return discovered;
}
