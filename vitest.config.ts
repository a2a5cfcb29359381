import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
    reporters: 'default',
    env: {
      LOG_LEVEL: 'error',
      OTEL_TRACES_EXPORTER: 'none',
    },
  },
});
