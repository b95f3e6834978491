import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const workspace = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to their sources, so tests need no build
      '@reqsafe/kernel': workspace('kernel'),
      '@reqsafe/tokens': workspace('tokens'),
      '@reqsafe/idempotency': workspace('idempotency'),
      '@reqsafe/middleware-express': workspace('middleware-express'),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
    // Timeout for tests
    testTimeout: 10000,
  },
});
