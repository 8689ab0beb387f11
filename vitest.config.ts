import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      NASA_API_KEY: 'test-key',
      MISSIONS_CSV_PATH: './does-not-exist/missions.csv',
      DB_PATH: './does-not-exist/test.db',
    },
  },
});
