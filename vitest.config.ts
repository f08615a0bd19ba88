import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Pure logic, no DOM
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
});
