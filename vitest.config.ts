import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      DATABASE_PATH: ':memory:',
      PUBLIC_URL: 'http://localhost:3001',
      JWT_SECRET: 'test-secret-test-secret-test-secret',
      TMDB_API_KEY: 'test-key',
      TMDB_RETRY_BASE_DELAY_MS: '0',
    },
  },
});
