import fs from 'fs';
import path from 'path';
import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InstallManager, resolvePluginName } from '../../app/src/install-manager.js';
import type { PluginRuntime } from '../../app/src/runtime.js';
import { fixtureSource, makeTempDir, startTestRuntime } from './helpers/plugin-test-setup.js';

const encoder = new TextEncoder();

describe('resolvePluginName', () => {
  it('prefers an explicit name', () => {
    expect(
      resolvePluginName('// @plugin-name pragma', {
        name: 'explicit',
        filename: 'file.js',
        url: 'https://plugins.example.test/url.js',
      }),
    ).toBe('explicit');
  });

  it('falls back to the filename stem, then the URL stem', () => {
    expect(resolvePluginName('', { filename: 'uploads/weather.js' })).toBe('weather');
    expect(resolvePluginName('', { url: 'https://plugins.example.test/dl/echo.js?v=2' })).toBe(
      'echo',
    );
  });

  it('reads the @plugin-name header when nothing else names the plugin', () => {
    expect(resolvePluginName('// @plugin-name greeter\nexports.register = 1;', {})).toBe('greeter');
    expect(resolvePluginName('', { url: 'https://plugins.example.test/' })).toBeNull();
  });
});

describe('InstallManager', () => {
  let tmpDir: string;
  let runtime: PluginRuntime;

  beforeEach(async () => {
    tmpDir = makeTempDir();
    runtime = await startTestRuntime(tmpDir);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await runtime.stop();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('installFromBytes', () => {
    it('installs under the filename stem and enables by default', async () => {
      const result = await runtime.installer.installFromBytes(
        encoder.encode(fixtureSource('echo')),
        { filename: 'echo.js' },
      );

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.descriptor.name).toBe('echo');
      expect(result.value.status.status).toBe('enabled');
      expect(fs.existsSync(path.join(runtime.config.pluginsDir, 'echo.js'))).toBe(true);
    });

    it('names the plugin from its header pragma', async () => {
      const result = await runtime.installer.installFromBytes(
        encoder.encode(fixtureSource('weather')),
      );
      expect(result.ok && result.value.descriptor.name).toBe('weather');
    });

    it('passes autoEnable and config through to the registry', async () => {
      const result = await runtime.installer.installFromBytes(
        encoder.encode(fixtureSource('weather')),
        { name: 'forecast', autoEnable: false, config: { units: 'imperial' } },
      );

      expect(result.ok && result.value.status.status).toBe('installed-disabled');
      const info = runtime.registry.getInfo('forecast');
      expect(info.ok && info.value.config).toEqual({ units: 'imperial' });
    });

    it('rejects source it cannot name', async () => {
      const result = await runtime.installer.installFromBytes(
        encoder.encode(fixtureSource('echo')),
      );
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidName');
      expect(result.error.message).toBe('Cannot determine plugin name; pass a name or filename');
    });

    it('rejects an unsafe name', async () => {
      const result = await runtime.installer.installFromBytes(
        encoder.encode(fixtureSource('echo')),
        { filename: 'two words.js' },
      );
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidName');
      expect(result.error.message).toBe('Invalid plugin name: "two words"');
    });

    it('rejects empty, oversized and non-UTF-8 input', async () => {
      const installer = new InstallManager({
        registry: runtime.registry,
        maxPluginSizeBytes: 64,
        fetchTimeoutMs: 1000,
      });

      const empty = await installer.installFromBytes(new Uint8Array(0), { name: 'x' });
      const oversized = await installer.installFromBytes(new Uint8Array(65).fill(32), {
        name: 'x',
      });
      const binary = await installer.installFromBytes(new Uint8Array([0xff, 0xfe, 0x00]), {
        name: 'x',
      });

      expect(empty.ok || empty.error.message).toBe('Plugin source is empty');
      expect(oversized.ok || oversized.error.message).toBe(
        'Plugin source is 65 bytes, limit is 64',
      );
      expect(binary.ok || binary.error.message).toBe('Plugin source is not valid UTF-8');
      expect(runtime.registry.list().totalCount).toBe(0);
    });

    it('rejects source that does not compile without writing it', async () => {
      const result = await runtime.installer.installFromBytes(
        encoder.encode('exports.register = function ('),
        { name: 'typo' },
      );
      expect(result.ok || result.error.code).toBe('InvalidSource');
      expect(fs.existsSync(path.join(runtime.config.pluginsDir, 'typo.js'))).toBe(false);
    });
  });

  describe('installFromUrl', () => {
    it('downloads and installs under the URL stem', async () => {
      const fetchMock = vi.fn(async (_url: URL, _init?: RequestInit) =>
        new Response(fixtureSource('echo'), { status: 200 }),
      );
      vi.stubGlobal('fetch', fetchMock);

      const result = await runtime.installer.installFromUrl(
        'https://plugins.example.test/releases/echo.js',
      );

      expect(result.ok && result.value.descriptor.name).toBe('echo');
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(String(fetchMock.mock.calls[0][0])).toBe(
        'https://plugins.example.test/releases/echo.js',
      );
      expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
    });

    it('reports a non-2xx response as FetchError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => new Response('missing', { status: 404 })),
      );
      const result = await runtime.installer.installFromUrl(
        'https://plugins.example.test/echo.js',
      );
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('FetchError');
      expect(result.error.message).toBe('Failed to download plugin: HTTP 404');
    });

    it('reports a network error as FetchError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => {
          throw new TypeError('fetch failed');
        }),
      );
      const result = await runtime.installer.installFromUrl(
        'https://plugins.example.test/echo.js',
      );
      expect(result.ok || result.error.message).toBe('Failed to download plugin: fetch failed');
    });

    it('aborts a download that exceeds the fetch timeout', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(
          (_url: URL, init?: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
              init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
            }),
        ),
      );
      const installer = new InstallManager({
        registry: runtime.registry,
        maxPluginSizeBytes: 1024,
        fetchTimeoutMs: 20,
      });

      const result = await installer.installFromUrl('https://plugins.example.test/echo.js');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('FetchError');
      expect(result.error.message).toBe('Download timed out after 20ms');
    });

    it('refuses a download whose declared length is over the limit', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(
          async () =>
            new Response(fixtureSource('echo'), {
              status: 200,
              headers: { 'content-length': '5000' },
            }),
        ),
      );
      const installer = new InstallManager({
        registry: runtime.registry,
        maxPluginSizeBytes: 1024,
        fetchTimeoutMs: 1000,
      });

      const result = await installer.installFromUrl('https://plugins.example.test/echo.js');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidSource');
      expect(result.error.message).toBe('Plugin source is 5000 bytes, limit is 1024');
      expect(runtime.registry.list().totalCount).toBe(0);
    });

    it('stops reading an endless body once it passes the limit', async () => {
      let pulledBytes = 0;
      let cancelled = false;
      const endless = new ReadableStream<Uint8Array>({
        pull(controller) {
          pulledBytes += 1024;
          controller.enqueue(new Uint8Array(1024).fill(32));
        },
        cancel() {
          cancelled = true;
        },
      });
      vi.stubGlobal('fetch', vi.fn(async () => new Response(endless, { status: 200 })));
      const installer = new InstallManager({
        registry: runtime.registry,
        maxPluginSizeBytes: 4096,
        fetchTimeoutMs: 1000,
      });

      const result = await installer.installFromUrl('https://plugins.example.test/echo.js');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidSource');
      expect(result.error.message).toBe('Plugin source exceeds the 4096 byte limit');
      expect(pulledBytes).toBeLessThanOrEqual(8 * 1024);
      await vi.waitFor(() => expect(cancelled).toBe(true));
    });

    it('rejects malformed and non-http URLs without fetching', async () => {
      const fetchMock = vi.fn();
      vi.stubGlobal('fetch', fetchMock);

      const malformed = await runtime.installer.installFromUrl('not a url');
      const ftp = await runtime.installer.installFromUrl('ftp://plugins.example.test/echo.js');

      expect(malformed.ok || malformed.error.message).toBe('Invalid plugin URL: not a url');
      expect(ftp.ok || ftp.error.message).toBe('Unsupported URL protocol: ftp:');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
