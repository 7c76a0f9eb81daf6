import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@branchlens/shared': path.resolve(__dirname, '../../shared/src'),
      '@branchlens/core': path.resolve(__dirname, '../../core/src'),
      '@branchlens/module-combos': path.resolve(__dirname, '../combos/src'),
      '@branchlens/module-forecasting': path.resolve(__dirname, '../forecasting/src'),
      '@branchlens/module-expansion': path.resolve(__dirname, '../expansion/src'),
      '@branchlens/module-growth': path.resolve(__dirname, '../growth/src'),
      '@branchlens/module-staffing': path.resolve(__dirname, '../staffing/src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts'],
    },
  },
});
