import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { defineConfig } from 'vitest/config';

const workspaceRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

export default defineConfig({
  resolve: {
    alias: {
      '@session-insights/core': path.join(workspaceRoot, 'packages/core/src'),
      '@session-insights/ai-openai': path.join(workspaceRoot, 'packages/ai-openai/src'),
      '@session-insights/pipeline': path.join(workspaceRoot, 'packages/pipeline/src')
    }
  },
  test: {
    globals: true,
    environment: 'node',
    root: path.join(workspaceRoot, 'test'),
    include: ['unit/**/*.spec.ts', 'integration/**/*.spec.ts'],
    setupFiles: []
  }
});
