import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  './vitest.config.ts',
  {
    // Loads the published modules the way a consumer does: no setup file,
    // so nothing has installed the reflect polyfill beforehand.
    test: {
      name: 'entry',
      environment: 'node',
      include: ['tests/entry/**/*.test.ts'],
      testTimeout: 10_000,
    },
  },
]);
