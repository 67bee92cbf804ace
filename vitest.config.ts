import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Property tests run a few hundred engine ticks per case
    testTimeout: 30000,
    reporters: ['default'],
  },
});
