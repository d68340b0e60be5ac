import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_KEY: 'test-key',
      CURSOR_SECRET: 'test-secret',
    },
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'tests'],
    },
  },
});
