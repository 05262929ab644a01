import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      SQLITE_PATH: ':memory:',
      JWT_SECRET: 'test-secret',
    },
  },
});
