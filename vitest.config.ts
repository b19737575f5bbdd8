import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'services/*/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      STORAGE_DRIVER: 'memory',
      EVENT_BUS_DRIVER: 'memory',
      JWT_ACCESS_SECRET: 'test-secret-test-secret-test-secret',
    },
  },
});
