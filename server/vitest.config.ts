import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      DATA_STORE: 'memory',
      JWT_SECRET: 'test-secret',
    },
  },
});
