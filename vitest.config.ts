import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    globals: false,
    environment: 'node',
    // Disable watch mode by default (use vitest --watch explicitly)
    watch: false,
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
