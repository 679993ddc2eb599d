import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages export their built output; tests run against the sources
function workspaceSource(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@plugin-runtime/core': workspaceSource('core'),
      '@plugin-runtime/event-bus': workspaceSource('event-bus'),
      '@plugin-runtime/plugin-api': workspaceSource('plugin-api'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
  },
});
