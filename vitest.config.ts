import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      PATHWALK_ENV: 'test',
      PATHWALK_LOG_LEVEL: 'silent',
    },
  },
});
