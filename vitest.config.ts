import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': new URL('src', import.meta.url).pathname,
      '@test': new URL('test', import.meta.url).pathname,
    },
  },
  test: {
    environment: 'node',
    exclude: ['node_modules/**', 'dist/**'],
    globals: true,
    include: [],
    projects: [
      {
        extends: true,
        test: {
          exclude: ['src/**/__tests__/*.integration.test.ts'],
          include: ['src/**/__tests__/*.test.ts'],
          name: 'unit',
          testTimeout: 5000,
        },
      },
      {
        extends: true,
        test: {
          include: ['src/**/__tests__/*.integration.test.ts'],
          name: 'integration',
          testTimeout: 30_000,
        },
      },
    ],
  },
});
