/**
 * Tests for plugin artifact discovery.
 * Uses real temp directories (the functions under test only read).
 */

import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  artifactPath,
  discoverPluginArtifacts,
  isValidPluginName,
  pluginConfigPath,
} from '../../app/src/plugin-discovery.js';
import { makeTempDir } from './helpers/plugin-test-setup.js';

describe('isValidPluginName', () => {
  it('accepts letters, digits, underscore and hyphen', () => {
    expect(isValidPluginName('weather')).toBe(true);
    expect(isValidPluginName('My_Plugin-2')).toBe(true);
  });

  it('rejects path separators, dots and empty names', () => {
    expect(isValidPluginName('')).toBe(false);
    expect(isValidPluginName('../etc')).toBe(false);
    expect(isValidPluginName('a/b')).toBe(false);
    expect(isValidPluginName('plugin.js')).toBe(false);
    expect(isValidPluginName('has space')).toBe(false);
  });

  it('rejects object keys and API route segments', () => {
    for (const name of ['__proto__', 'constructor', 'prototype', 'hooks', 'install', 'load', 'upload']) {
      expect(isValidPluginName(name)).toBe(false);
    }
    expect(isValidPluginName('hooks2')).toBe(true);
  });

  it('rejects names longer than 100 characters', () => {
    expect(isValidPluginName('a'.repeat(100))).toBe(true);
    expect(isValidPluginName('a'.repeat(101))).toBe(false);
  });
});

describe('artifact paths', () => {
  it('places artifacts and config files in the plugins directory', () => {
    expect(artifactPath('/srv/plugins', 'weather')).toBe(path.join('/srv/plugins', 'weather.js'));
    expect(pluginConfigPath('/srv/plugins', 'weather')).toBe(
      path.join('/srv/plugins', 'weather.config.json'),
    );
  });
});

describe('discoverPluginArtifacts', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns empty array for non-existent directory', () => {
    expect(discoverPluginArtifacts(path.join(tmpDir, 'missing'))).toEqual([]);
  });

  it('returns empty array for empty directory', () => {
    expect(discoverPluginArtifacts(tmpDir)).toEqual([]);
  });

  it('finds .js artifacts sorted by name', () => {
    fs.writeFileSync(path.join(tmpDir, 'zeta.js'), '');
    fs.writeFileSync(path.join(tmpDir, 'alpha.js'), '');

    expect(discoverPluginArtifacts(tmpDir)).toEqual([
      { name: 'alpha', filePath: path.join(tmpDir, 'alpha.js') },
      { name: 'zeta', filePath: path.join(tmpDir, 'zeta.js') },
    ]);
  });

  it('ignores config files, temp files, dotfiles and other extensions', () => {
    fs.writeFileSync(path.join(tmpDir, 'weather.js'), '');
    fs.writeFileSync(path.join(tmpDir, 'weather.config.json'), '{}');
    fs.writeFileSync(path.join(tmpDir, 'config.json'), '{}');
    fs.writeFileSync(path.join(tmpDir, 'weather.js.123.1.tmp'), '');
    fs.writeFileSync(path.join(tmpDir, '.hidden.js'), '');
    fs.writeFileSync(path.join(tmpDir, 'notes.ts'), '');

    expect(discoverPluginArtifacts(tmpDir).map((a) => a.name)).toEqual(['weather']);
  });

  it('skips artifacts whose stem is not a valid plugin name', () => {
    fs.writeFileSync(path.join(tmpDir, 'two words.js'), '');
    fs.writeFileSync(path.join(tmpDir, 'dotted.name.js'), '');
    fs.writeFileSync(path.join(tmpDir, '__proto__.js'), '');
    fs.writeFileSync(path.join(tmpDir, 'hooks.js'), '');
    fs.writeFileSync(path.join(tmpDir, 'fine.js'), '');

    expect(discoverPluginArtifacts(tmpDir).map((a) => a.name)).toEqual(['fine']);
  });

  it('skips directories named like artifacts', () => {
    fs.mkdirSync(path.join(tmpDir, 'folder.js'));
    expect(discoverPluginArtifacts(tmpDir)).toEqual([]);
  });

  it('skips symlinked artifacts', () => {
    const outside = path.join(tmpDir, 'outside');
    fs.mkdirSync(outside);
    fs.writeFileSync(path.join(outside, 'real.js'), '');
    const pluginsDir = path.join(tmpDir, 'plugins');
    fs.mkdirSync(pluginsDir);
    fs.symlinkSync(path.join(outside, 'real.js'), path.join(pluginsDir, 'linked.js'));

    expect(discoverPluginArtifacts(pluginsDir)).toEqual([]);
  });
});
