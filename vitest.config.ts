import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'ERROR',
      LLM_PROVIDER: 'google',
      DB_NAME: 'tshirt_store_test',
    },
  },
});
