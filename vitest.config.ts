import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    globals: true,
    include: ['packages/*/__tests__/**/*.spec.ts'],
    // the CLI e2e spec starts node + tsx per case
    testTimeout: 30_000,
    coverage: { include: ['packages/*/src/**'], thresholds: { lines: 90 } },
    environment: 'node'
  }
});
