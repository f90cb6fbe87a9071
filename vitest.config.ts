import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      CERTLENS_LOG_LEVEL: 'silent',
    },
  },
});
