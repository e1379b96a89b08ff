/**
 * Vitest configuration
 *
 * Mirrors the tsconfig.json path aliases so tests resolve '@services/...',
 * '@utils/...', '@config/...' and '@t/...' the same way the sources do.
 */
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (dir: string): string => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@config': fromRoot('./src/config'),
      '@services': fromRoot('./src/services'),
      '@utils': fromRoot('./src/utils'),
      '@t': fromRoot('./src/types'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 20_000,
    pool: 'forks',
  },
});
