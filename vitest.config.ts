import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/ts/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // Contract tests spawn the CLI through tsx.
    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
