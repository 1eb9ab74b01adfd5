import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['namada_watch_ts/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent'
    }
  }
});
