import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Classifier training on the bundled dataset can take a few seconds
    testTimeout: 10000,
    globals: true,
    include: ['src/**/*.test.ts'],
  },
});
