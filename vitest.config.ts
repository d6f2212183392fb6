import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'unit',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['tests/entry/**', 'node_modules/**'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10_000,
    restoreMocks: true,
  },
});
