import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    setupFiles: ['./packages/agent/src/__tests__/vitest.setup.ts'],
    globals: true,
  },
});
