import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromHere = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    name: 'stats-agent-service',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@clusterwatch/platform-core': fromHere('../../platform-core/src/index.ts'),
      '@clusterwatch/shared-contracts': fromHere('../../shared/contracts/src/index.ts'),
    },
  },
});
