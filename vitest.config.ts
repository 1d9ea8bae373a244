import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['server/test/**/*.test.ts', 'cli/test/**/*.test.ts'],
    env: {
      ENVIRONMENT: 'local',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_KEY: 'test-service-key',
      JWT_SECRET: 'test-secret',
      REFRESH_TOKEN_SECRET: 'test-refresh-secret',
      LOG_LEVEL: 'error',
    },
  },
});
